/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

import express from "express";
import * as dotenv from "dotenv";
import { loadEngineConfig } from "./config/engine-config";
import { createEngine } from "./engine";
import { registerRoutes } from "./routes";

// Load environment variables from .env file
dotenv.config();

const app = express();

// Trust the load balancer so req.ip reflects the client
app.set('trust proxy', 1);

app.use(express.json({ limit: '256kb' }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`;
      if (logLine.length > 80) {
        logLine = logLine.slice(0, 79) + "…";
      }
      console.log(`[API] ${logLine}`);
    }
  });

  next();
});

(async () => {
  try {
    console.log('=== Server Startup Started ===');
    const config = loadEngineConfig();
    console.log(`NODE_ENV: ${config.env}`);
    console.log(`PORT: ${config.port}`);
    console.log(`DATABASE_URL: ${config.databaseUrl ? 'Set ✓' : 'Missing ✗'}`);

    if (!config.databaseUrl) {
      console.error('❌ DATABASE_URL is required');
      process.exit(1);
    }

    console.log('Initializing database...');
    const { initializeDatabase } = await import('./db-init');
    const dbInitSuccess = await initializeDatabase();
    if (!dbInitSuccess) {
      console.error('❌ Failed to initialize database');
      process.exit(1);
    }
    console.log('✅ Database initialized successfully');

    const { db } = await import('./db');
    const { DatabaseStorage } = await import('./storage');
    const engine = createEngine(config, new DatabaseStorage(db));
    engine.rateLimiter.startSweeper();

    console.log('Registering routes...');
    const server = registerRoutes(app, engine);
    console.log('Routes registered successfully ✓');

    console.log('Starting analytics rollup job...');
    const { startAnalyticsRollupJob } = await import('./jobs/analytics-rollup');
    startAnalyticsRollupJob(engine.aggregator, config.analyticsCron);

    console.log(`Attempting to listen on 0.0.0.0:${config.port}...`);
    server.listen({ port: config.port, host: "0.0.0.0" }, () => {
      console.log('=== SERVER STARTED SUCCESSFULLY ===');
      console.log(`✓ Listening on 0.0.0.0:${config.port}`);
      console.log(`✓ Environment: ${config.env}`);
      console.log(`✓ Classifier: ${engine.classifier.version}`);
      console.log('===================================');
    });

    server.on('error', (err: NodeJS.ErrnoException) => {
      console.error('❌ Server error:', err);
      if (err.code === 'EADDRINUSE') {
        console.error(`Port ${config.port} is already in use`);
      }
      process.exit(1);
    });
  } catch (error) {
    console.error('❌ FATAL ERROR during server startup:');
    console.error(error);
    process.exit(1);
  }
})().catch((error) => {
  console.error('❌ Unhandled error in main async function:');
  console.error(error);
  process.exit(1);
});
