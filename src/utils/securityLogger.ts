/**
 * Security Logging Service
 *
 * One JSON line per event on stdout/stderr, for the log aggregator to pick up.
 * Token strings must never be passed in the context.
 */

export type SecurityEventType =
    | 'token_issued'
    | 'token_rejected'
    | 'token_revoked'
    | 'signing_method_mismatch'
    | 'store_error'
    | 'rate_limit_exceeded'
    | 'system';

export type SecurityLogLevel = 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

export interface SecurityEventData {
    type?: SecurityEventType;
    ip?: string;
    path?: string;
    method?: string;
    subject?: string;
    tokenType?: string;
    details?: unknown;
    [key: string]: unknown;
}

export class SecurityLogger {
    static info(message: string, data: SecurityEventData = {}): void {
        this.log('INFO', message, data);
    }

    /**
     * Suspicious but handled
     */
    static warn(message: string, data: SecurityEventData = {}): void {
        this.log('WARN', message, data);
    }

    static error(message: string, error?: unknown, data: SecurityEventData = {}): void {
        this.log('ERROR', message, {
            details: error instanceof Error ? { name: error.name, message: error.message } : error,
            ...data,
        });
    }

    /**
     * Events operators should alert on, such as a forged signing algorithm
     */
    static critical(message: string, data: SecurityEventData = {}): void {
        this.log('CRITICAL', message, data);
    }

    private static log(level: SecurityLogLevel, message: string, data: SecurityEventData): void {
        const logEntry = {
            timestamp: new Date().toISOString(),
            level,
            type: 'system',
            environment: process.env.NODE_ENV || 'development',
            message,
            ...data,
        };

        if (level === 'ERROR' || level === 'CRITICAL') {
            console.error(JSON.stringify(logEntry));
        } else if (level === 'WARN') {
            console.warn(JSON.stringify(logEntry));
        } else {
            console.log(JSON.stringify(logEntry));
        }
    }
}

export default SecurityLogger;
