import type { AnalyticsSummary, ConversationTurn, FlaggedItem, ReviewStatus, Student } from '@shared/schema';
import type {
  FlaggedItemDetail,
  IStorage,
  NewSummary,
  PlatformCounts,
  RecordTurnInput,
  RecordedTurn,
  StudentOverview,
  SummaryScope,
  TurnWithStudent,
} from '../../server/storage';
import { GLOBAL_GROUPING_KEY, studentGroupingKey } from '../../server/storage';

const newestFirst = <T extends { id: number }>(at: (row: T) => Date) => (a: T, b: T) =>
  at(b).getTime() - at(a).getTime() || b.id - a.id;

/** In-process IStorage with the same ordering and transaction semantics as DatabaseStorage. */
export class MemStorage implements IStorage {
  readonly students = new Map<string, Student>();
  readonly turns: ConversationTurn[] = [];
  readonly flags: FlaggedItem[] = [];
  summaries: AnalyticsSummary[] = [];

  /** Number of upcoming recordTurn calls that fail before writing anything. */
  failRecordTurn = 0;
  recordTurnError: unknown = new Error('connection terminated unexpectedly');
  failSummaryWrites = false;
  recordTurnCalls = 0;

  private nextTurnId = 1;
  private nextFlagId = 1;
  private nextSummaryId = 1;

  async recordTurn(input: RecordTurnInput): Promise<RecordedTurn> {
    this.recordTurnCalls++;
    if (this.failRecordTurn > 0) {
      this.failRecordTurn--;
      throw this.recordTurnError;
    }

    const existing = this.students.get(input.student.studentId);
    const student: Student = existing
      ? {
          ...existing,
          lastActiveAt: input.turn.createdAt > existing.lastActiveAt ? input.turn.createdAt : existing.lastActiveAt,
          displayName: existing.displayName ?? input.student.displayName ?? null,
          email: existing.email ?? input.student.email ?? null,
        }
      : {
          studentId: input.student.studentId,
          displayName: input.student.displayName ?? null,
          email: input.student.email ?? null,
          enrolledAt: input.turn.createdAt,
          lastActiveAt: input.turn.createdAt,
        };

    const turn: ConversationTurn = { ...input.turn, id: this.nextTurnId++ };
    const flag: FlaggedItem | null = input.flag
      ? {
          ...input.flag,
          id: this.nextFlagId++,
          turnId: turn.id,
          studentId: turn.studentId,
          status: 'unreviewed',
          reviewedBy: null,
          reviewedAt: null,
        }
      : null;

    this.students.set(student.studentId, student);
    this.turns.push(turn);
    if (flag) this.flags.push(flag);
    return { student, turn, flag };
  }

  async listStudents(limit: number, offset: number): Promise<StudentOverview[]> {
    return [...this.students.values()]
      .sort((a, b) => b.lastActiveAt.getTime() - a.lastActiveAt.getTime() || (a.studentId < b.studentId ? -1 : 1))
      .slice(offset, offset + limit)
      .map((student) => {
        const own = this.turns.filter((turn) => turn.studentId === student.studentId);
        const last = own.reduce<Date | null>(
          (latest, turn) => (!latest || turn.createdAt > latest ? turn.createdAt : latest),
          null
        );
        return { ...student, totalTurns: own.length, lastTurnAt: last };
      });
  }

  async getStudentTurns(studentId: string, limit: number): Promise<ConversationTurn[]> {
    return this.turns
      .filter((turn) => turn.studentId === studentId)
      .sort(newestFirst((turn) => turn.createdAt))
      .slice(0, limit)
      .reverse();
  }

  async listRecentTurns(limit: number, offset: number): Promise<TurnWithStudent[]> {
    return [...this.turns]
      .sort(newestFirst((turn) => turn.createdAt))
      .slice(offset, offset + limit)
      .map((turn) => {
        const student = this.students.get(turn.studentId);
        return { ...turn, displayName: student?.displayName ?? null, email: student?.email ?? null };
      });
  }

  async listTurnsInWindow(start: Date, end: Date, studentId?: string): Promise<ConversationTurn[]> {
    return this.turns
      .filter((turn) => turn.createdAt >= start && turn.createdAt < end)
      .filter((turn) => !studentId || turn.studentId === studentId)
      .sort((a, b) => a.id - b.id);
  }

  async listFlaggedItems(status: ReviewStatus | undefined, limit: number): Promise<FlaggedItemDetail[]> {
    const details: FlaggedItemDetail[] = [];
    for (const flag of [...this.flags].sort(newestFirst((item) => item.flaggedAt))) {
      if (status && flag.status !== status) continue;
      const turn = this.turns.find((candidate) => candidate.id === flag.turnId);
      if (!turn) continue;
      const student = this.students.get(flag.studentId);
      details.push({
        ...flag,
        message: turn.message,
        sessionId: turn.sessionId,
        displayName: student?.displayName ?? null,
        email: student?.email ?? null,
      });
    }
    return details.slice(0, limit);
  }

  async updateFlagReviewStatus(
    flagId: number,
    status: ReviewStatus,
    reviewedBy: string,
    reviewedAt: Date
  ): Promise<FlaggedItem | undefined> {
    const index = this.flags.findIndex((flag) => flag.id === flagId);
    if (index === -1) return undefined;
    const updated = { ...this.flags[index], status, reviewedBy, reviewedAt };
    this.flags[index] = updated;
    return updated;
  }

  async replaceSummaries(scope: SummaryScope, rows: NewSummary[]): Promise<AnalyticsSummary[]> {
    if (this.failSummaryWrites) {
      throw new Error('summary write failed');
    }
    const sameWindow = (row: AnalyticsSummary) =>
      row.windowStart.getTime() === scope.windowStart.getTime() &&
      row.windowEnd.getTime() === scope.windowEnd.getTime();
    const inScope = (row: AnalyticsSummary) =>
      scope.kind === 'window'
        ? row.groupingKey === GLOBAL_GROUPING_KEY || row.groupingKey.startsWith('topic:')
        : row.groupingKey === studentGroupingKey(scope.studentId);

    const previous = new Map(
      this.summaries.filter((row) => sameWindow(row) && inScope(row)).map((row) => [row.groupingKey, row.id])
    );
    const saved = rows.map((row) => ({ ...row, id: previous.get(row.groupingKey) ?? this.nextSummaryId++ }));

    this.summaries = [
      ...this.summaries.filter((row) => !(sameWindow(row) && inScope(row))),
      ...saved,
    ];
    return saved;
  }

  async getSummaries(windowStart: Date, windowEnd: Date, groupingKey?: string): Promise<AnalyticsSummary[]> {
    return this.summaries
      .filter((row) =>
        row.windowStart.getTime() === windowStart.getTime() &&
        row.windowEnd.getTime() === windowEnd.getTime() &&
        (!groupingKey || row.groupingKey === groupingKey)
      )
      .sort((a, b) => (a.groupingKey < b.groupingKey ? -1 : a.groupingKey > b.groupingKey ? 1 : 0));
  }

  async getPlatformCounts(dayStart: Date, weekStart: Date): Promise<PlatformCounts> {
    const activeSince = (since: Date) =>
      new Set(this.turns.filter((turn) => turn.createdAt >= since).map((turn) => turn.studentId)).size;
    return {
      totalStudents: this.students.size,
      totalTurns: this.turns.length,
      activeToday: activeSince(dayStart),
      activeWeek: activeSince(weekStart),
      unreviewedFlags: this.flags.filter((flag) => flag.status === 'unreviewed').length,
    };
  }
}

/** Writes a labelled turn straight to storage, bypassing the pipeline. */
export async function seedTurn(
  storage: IStorage,
  turn: Partial<Omit<ConversationTurn, 'id'>> & Pick<ConversationTurn, 'studentId' | 'sessionId' | 'createdAt'>,
  flag: { reason: string; severity: FlaggedItem['severity'] } | null = null
): Promise<RecordedTurn> {
  const role = turn.role ?? 'student';
  return storage.recordTurn({
    student: { studentId: turn.studentId, displayName: null, email: null },
    turn: {
      role,
      message: 'seeded turn',
      topic: 'general',
      sentiment: 'neutral',
      questionType: role === 'student' ? 'other' : null,
      safetyFlagged: flag !== null,
      safetyReason: flag?.reason ?? null,
      classificationDegraded: false,
      tokensEst: null,
      responseTimeMs: null,
      ...turn,
    },
    flag: flag ? { flaggedAt: turn.createdAt, ...flag } : null,
  });
}
