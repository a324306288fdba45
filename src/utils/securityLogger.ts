/**
 * Security Logging Service
 *
 * One JSON line per CSRF or session event. Token values and raw session ids
 * never go into event data; use `sessionTag` to correlate lines of one session.
 */

import crypto from 'crypto';

export type SecurityEventType =
    | 'csrf_rejected'
    | 'csrf_token_rotated'
    | 'csrf_config_error'
    | 'session_error'
    | 'system_error';

export type SecurityLevel = 'INFO' | 'WARN' | 'ERROR';

export interface SecurityEventData {
    event?: SecurityEventType;
    ip?: string;
    userAgent?: string;
    path?: string;
    method?: string;
    reason?: string;
    source?: string;
    sessionId?: string;
    details?: unknown;
    [key: string]: unknown;
}

const WRITERS: Record<SecurityLevel, (line: string) => void> = {
    INFO: (line) => console.log(line),
    WARN: (line) => console.warn(line),
    ERROR: (line) => console.error(line),
};

export class SecurityLogger {
    static info(message: string, data: SecurityEventData = {}): void {
        this.emit('INFO', message, data);
    }

    /**
     * Handled but suspicious, e.g. a rejected request
     */
    static warn(message: string, data: SecurityEventData = {}): void {
        this.emit('WARN', message, data);
    }

    /**
     * Configuration or environment failure
     */
    static error(message: string, data: SecurityEventData = {}): void {
        this.emit('ERROR', message, data);
    }

    private static emit(level: SecurityLevel, message: string, data: SecurityEventData): void {
        WRITERS[level](
            JSON.stringify({
                timestamp: new Date().toISOString(),
                level,
                type: 'SECURITY_EVENT',
                message,
                ...data,
            })
        );
    }
}

/**
 * Short one-way tag of a session id, stable across log lines
 */
export function sessionTag(sessionId: string): string {
    return crypto.createHash('sha256').update(sessionId).digest('hex').slice(0, 12);
}

export default SecurityLogger;
