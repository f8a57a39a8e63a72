/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { AuthError } from '../errors';
import type { AccessGate, Identity } from '../services/access-gate';
import { sendError } from '../utils/send-error';

declare global {
  namespace Express {
    interface Request {
      identity?: Identity;
    }
  }
}

export function requireAuth(gate: AccessGate): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      req.identity = gate.authenticate(req.headers.authorization);
      next();
    } catch (error) {
      sendError(res, error, 'Auth');
    }
  };
}

export function getIdentity(req: Request): Identity {
  if (!req.identity) {
    throw new AuthError('Not authenticated');
  }
  return req.identity;
}
