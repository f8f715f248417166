/**
 * The slice of the pino API domain components log through. Fastify's
 * `app.log` satisfies it, and so does a bare `pino()` instance in tests.
 */
export interface Logger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}
