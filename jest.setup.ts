/**
 * Jest setup file.
 * Quiet the logger and provide a global fetch mock so tests can stub upstream APIs.
 */

process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';

// Cast jest.fn() to the expected `fetch` type to avoid `any`.
global.fetch = (jest.fn() as unknown) as typeof fetch;

export {};
