/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

import type { Express } from "express";
import { createServer, type Server } from "http";
import type { Engine } from "./engine";
import { requireAuth } from "./middleware/require-auth";
import { createAdminRouter } from "./routes/admin";
import { createChatRouter } from "./routes/chat";
import { createStudentRouter } from "./routes/students";

export interface RouteOptions {
  now?: () => Date;
}

export function registerRoutes(app: Express, engine: Engine, options: RouteOptions = {}): Server {
  // Health check endpoint
  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      classifier: engine.classifier.version,
    });
  });

  const auth = requireAuth(engine.accessGate);

  app.use("/api/chat", auth, createChatRouter({ pipeline: engine.pipeline, review: engine.review }));
  app.use("/api/admin", auth, createAdminRouter({
    review: engine.review,
    aggregator: engine.aggregator,
    accessGate: engine.accessGate,
    now: options.now,
  }));
  app.use("/api/students", auth, createStudentRouter({ review: engine.review }));

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "not_found", message: "Route not found" });
  });

  return createServer(app);
}
