import { describe, it, expect, beforeEach } from 'vitest';
import { AuthorizationError, NotFoundError } from '../server/errors';
import { AccessGate, type Identity } from '../server/services/access-gate';
import { AnalyticsAggregator, dayWindow } from '../server/services/analytics-aggregator';
import { ReviewService } from '../server/services/review-service';
import { MemStorage, seedTurn } from './helpers/mem-storage';
import { TEST_SECRET } from './helpers/tokens';

const admin: Identity = { studentId: 'staff-1', role: 'admin', email: 'admin@example.edu', name: 'Admin' };
const student: Identity = { studentId: 'stu-1', role: 'student', email: null, name: null };
const at = (day: number, hour: number) => new Date(Date.UTC(2025, 2, day, hour));

describe('ReviewService', () => {
  let storage: MemStorage;
  let aggregator: AnalyticsAggregator;
  let review: ReviewService;

  beforeEach(async () => {
    storage = new MemStorage();
    aggregator = new AnalyticsAggregator(storage);
    review = new ReviewService({
      storage,
      aggregator,
      accessGate: new AccessGate({ secret: TEST_SECRET, adminEmails: ['admin@example.edu'] }),
    });

    await seedTurn(storage, { studentId: 'stu-1', sessionId: 'sess-a', createdAt: at(3, 9), topic: 'math', message: 'first' });
    await seedTurn(storage, { studentId: 'stu-1', sessionId: 'sess-a', createdAt: at(3, 10), topic: 'math', message: 'second' });
    await seedTurn(
      storage,
      { studentId: 'stu-2', sessionId: 'sess-b', createdAt: at(3, 11), message: 'I feel hopeless' },
      { reason: 'self_harm', severity: 'critical' }
    );
    await seedTurn(
      storage,
      { studentId: 'stu-1', sessionId: 'sess-c', createdAt: at(1, 8), message: 'damn shit' },
      { reason: 'profanity', severity: 'medium' }
    );
  });

  describe('getSummary', () => {
    const window = dayWindow(at(3, 12));

    it('should compute rows on first read and serve stored rows afterwards', async () => {
      const computed = await review.getSummary(admin, window);
      expect(computed.map((row) => row.groupingKey)).toEqual(['global', 'topic:general', 'topic:math']);

      await seedTurn(storage, { studentId: 'stu-3', sessionId: 'sess-z', createdAt: at(3, 13) });
      const cached = await review.getSummary(admin, window);
      expect(cached[0].totalTurns).toBe(3);

      const refreshed = await review.getSummary(admin, window, { refresh: true });
      expect(refreshed[0].totalTurns).toBe(4);
    });

    it('should filter by topic and by student', async () => {
      const [math] = await review.getSummary(admin, window, { topic: 'math' });
      expect(math).toMatchObject({ groupingKey: 'topic:math', totalTurns: 2 });

      const [own] = await review.getSummary(admin, window, { studentId: 'stu-2' });
      expect(own).toMatchObject({ groupingKey: 'student:stu-2', totalTurns: 1, flaggedTurns: 1 });
    });

    it('should return nothing for a topic absent from a computed window', async () => {
      await review.getSummary(admin, window);
      expect(await review.getSummary(admin, window, { topic: 'history' })).toEqual([]);
    });

    it('should be admin only', async () => {
      await expect(review.getSummary(student, window)).rejects.toBeInstanceOf(AuthorizationError);
    });
  });

  describe('flag review', () => {
    it('should list flags newest first and filter by status', async () => {
      const all = await review.listFlagged(admin);
      expect(all.map((item) => item.reason)).toEqual(['self_harm', 'profanity']);
      expect(all[0]).toMatchObject({ message: 'I feel hopeless', sessionId: 'sess-b', status: 'unreviewed' });

      await review.setFlagReviewStatus(admin, all[1].id, 'reviewed-ok', at(4, 9));
      const open = await review.listFlagged(admin, 'unreviewed');
      expect(open.map((item) => item.reason)).toEqual(['self_harm']);
    });

    it('should record the reviewer and time', async () => {
      const [flag] = await review.listFlagged(admin, undefined, 1);
      const updated = await review.setFlagReviewStatus(admin, flag.id, 'reviewed-action-taken', at(4, 9));

      expect(updated).toMatchObject({
        status: 'reviewed-action-taken',
        reviewedBy: 'admin@example.edu',
        reviewedAt: at(4, 9),
      });
    });

    it('should reject unknown flags', async () => {
      await expect(review.setFlagReviewStatus(admin, 999, 'reviewed-ok')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should not let students review flags', async () => {
      await expect(review.listFlagged(student)).rejects.toBeInstanceOf(AuthorizationError);
      await expect(review.setFlagReviewStatus(student, 1, 'reviewed-ok')).rejects.toBeInstanceOf(AuthorizationError);
    });

    it('should leave analytics untouched by review decisions', async () => {
      const window = dayWindow(at(3, 12));
      const before = await review.getSummary(admin, window, { refresh: true });
      await review.setFlagReviewStatus(admin, 1, 'reviewed-ok', at(4, 9));
      const after = await review.getSummary(admin, window, { refresh: true });

      expect(after[0].flaggedTurns).toBe(before[0].flaggedTurns);
    });
  });

  describe('getStudentHistory', () => {
    it('should return the latest turns oldest first', async () => {
      const turns = await review.getStudentHistory(student, 'stu-1', 2);
      expect(turns.map((turn) => turn.message)).toEqual(['first', 'second']);
    });

    it('should let admins read any student', async () => {
      const turns = await review.getStudentHistory(admin, 'stu-2');
      expect(turns.map((turn) => turn.message)).toEqual(['I feel hopeless']);
    });

    it("should not let a student read another student's history", async () => {
      await expect(review.getStudentHistory(student, 'stu-2')).rejects.toBeInstanceOf(AuthorizationError);
    });
  });

  describe('dashboard reads', () => {
    it('should list students with turn counts', async () => {
      const students = await review.listStudents(admin);
      expect(students.map((s) => [s.studentId, s.totalTurns])).toEqual([
        ['stu-2', 1],
        ['stu-1', 3],
      ]);
    });

    it('should page recent conversations', async () => {
      const page = await review.listConversations(admin, 2, 1);
      expect(page.map((turn) => turn.message)).toEqual(['second', 'first']);
    });

    it('should report platform stats', async () => {
      await expect(review.getPlatformStats(admin, at(3, 18))).resolves.toEqual({
        totalStudents: 2,
        totalTurns: 4,
        activeToday: 2,
        activeWeek: 2,
        unreviewedFlags: 2,
        avgTurnsPerStudent: 2,
      });
    });
  });
});
