/**
 * Jest setup file.
 * Keep the shared logger quiet unless a run asks for output explicitly.
 */

if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}

export {};
