/**
 * Test setup file for vitest.
 *
 * Sets environment variables BEFORE any application module is imported, so
 * config/env.ts never picks up a developer's real key or provider and the
 * logger stays quiet.
 *
 * Tests build their own dependencies with a fake provider; nothing here
 * talks to the network.
 */

process.env.NODE_ENV = "test";
process.env.IMAGE_PROVIDER = "mock";
process.env.OPENAI_API_KEY = "test-secret";
process.env.LOG_LEVEL = process.env.LOG_LEVEL || "error";
process.env.LOG_FILE = "";
