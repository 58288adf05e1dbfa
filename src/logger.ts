/**
 * Minimal logging surface accepted by the registry and the bootstrapper.
 * Messages are prefixed with the emitting `[Component.method]`.
 */
export type Logger = Pick<Console, 'info' | 'warn'>;

export const defaultLogger: Logger = console;
