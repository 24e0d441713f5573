type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMetadata = Record<string, unknown>;

const getMode = (): 'production' | 'development' => {
    if (typeof process !== 'undefined' && process.env && process.env.NODE_ENV === 'production') {
        return 'production';
    }

    return 'development';
};

const isProduction = (): boolean => getMode() === 'production';

export const isProductionMode = (): boolean => isProduction();

// Episode labels (drug names) and patient identifiers stay out of the logs.
const REDACT_KEYS = [/^labels?$/i, /^patient/i, /episodes?$/i];

const redactValue = (value: unknown): unknown => {
    if (typeof value === 'bigint') {
        return value.toString();
    }

    if (typeof value === 'string') {
        // Keep bit strings and short identifiers, redact longer payloads.
        if (value.length > 4096 || value.includes('\n')) {
            return '[REDACTED]';
        }
        return value;
    }

    if (value && typeof value === 'object') {
        if (Array.isArray(value)) {
            return value.map((v) => redactValue(v));
        }

        return redactRecord(value);
    }

    return value;
};

const redactRecord = (record: object): LogMetadata => {
    const out: LogMetadata = {};
    for (const [k, v] of Object.entries(record)) {
        out[k] = REDACT_KEYS.some((re) => re.test(k)) ? '[REDACTED]' : redactValue(v);
    }
    return out;
};

const shouldLog = (level: LogLevel): boolean => {
    if (!isProduction()) return true;
    return level === 'warn' || level === 'error';
};

const emit = (level: LogLevel, message: string, metadata?: LogMetadata): void => {
    if (!shouldLog(level)) return;

    const entry = {
        timestamp: new Date().toISOString(),
        level,
        message: redactValue(message),
        ...(metadata ? redactRecord(metadata) : {}),
    };

    if (level === 'error') {
        console.error(JSON.stringify(entry));
    } else if (level === 'warn') {
        console.warn(JSON.stringify(entry));
    } else if (level === 'info') {
        console.info(JSON.stringify(entry));
    } else {
        console.log(JSON.stringify(entry));
    }
};

export const appLogger = {
    debug(message: string, metadata?: LogMetadata) {
        emit('debug', message, metadata);
    },
    info(message: string, metadata?: LogMetadata) {
        emit('info', message, metadata);
    },
    warn(message: string, metadata?: LogMetadata) {
        emit('warn', message, metadata);
    },
    error(message: string, metadata?: LogMetadata) {
        emit('error', message, metadata);
    },
};

export { redactRecord, redactValue };
