/**
 * Call Results — explicit outcome of every exchange interaction
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * A call either produced a value, failed in a way worth retrying (network,
 * rate limit, exchange 5xx), or failed fatally for this action (rejected
 * order, bad credentials). Callers branch on `kind`; nothing here throws.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export class ExchangeError extends Error {
    readonly code: number | null;
    readonly status: number | null;
    readonly retryable: boolean;

    constructor(message: string, options: { code?: number | null; status?: number | null; retryable: boolean }) {
        super(message);
        this.name = 'ExchangeError';
        this.code = options.code ?? null;
        this.status = options.status ?? null;
        this.retryable = options.retryable;
    }
}

export type CallResult<T> =
    | { kind: 'ok'; value: T }
    | { kind: 'retryable'; error: ExchangeError }
    | { kind: 'fatal'; error: ExchangeError };

export type CallFailure = Exclude<CallResult<never>, { kind: 'ok' }>;

/** Venue codes for rejected or missing API credentials */
export const AUTH_ERROR_CODES: ReadonlySet<number> = new Set([-2014, -2015]);

export function ok<T>(value: T): CallResult<T> {
    return { kind: 'ok', value };
}

export function retryable(message: string, code: number | null = null, status: number | null = null): CallFailure {
    return { kind: 'retryable', error: new ExchangeError(message, { code, status, retryable: true }) };
}

export function fatal(message: string, code: number | null = null, status: number | null = null): CallFailure {
    return { kind: 'fatal', error: new ExchangeError(message, { code, status, retryable: false }) };
}

/**
 * One-line description of a failed result for log lines.
 */
export function describeFailure(result: CallFailure): string {
    const code = result.error.code !== null ? ` code=${result.error.code}` : '';
    return `${result.kind}${code} ${result.error.message}`;
}

export function isAuthFailure(result: CallFailure): boolean {
    const { code, status } = result.error;
    return (code !== null && AUTH_ERROR_CODES.has(code)) || status === 401;
}
