export type LogLevel = 'debug' | 'info' | 'warn' | 'error';


const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && value in LEVEL_ORDER;
}

function envLevel(): LogLevel {
    const raw = process.env.LOG_LEVEL?.toLowerCase();
    return isLogLevel(raw) ? raw : 'info';
}


// Own fields such as a scraping error's `type` and `url` are kept.
function serializeError(e: Error): Record<string, unknown> {
    return { ...Object.fromEntries(Object.entries(e)), name: e.name, message: e.message, stack: e.stack };
}


function safeSerialize(meta: unknown): unknown {
    try {
        if (meta instanceof Error) return serializeError(meta);
        return JSON.parse(
            JSON.stringify(meta, (_k, v: unknown) => {
                if (v instanceof Set) return Array.from(v);
                if (v instanceof Map) return Object.fromEntries(v);
                if (typeof v === 'bigint') return v.toString();
                if (v instanceof Error) return serializeError(v);
                return v;
            })
        );
    } catch {
        return { value: String(meta) };
    }
}

type LogLine = {
    ts: string;
    level: LogLevel;
    name: string;
    msg: string;
    meta?: unknown;
};


/** Receives each formatted line; the default writes to the console. */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
    if (level === 'debug') console.debug(line);
    else if (level === 'info') console.log(line);
    else if (level === 'warn') console.warn(line);
    else console.error(line);
};


export class Logger {
    constructor(
        private level: LogLevel = envLevel(),
        private name = 'harvester',
        private sink: LogSink = consoleSink
    ) { }


    private should(level: LogLevel) {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }


    private line(level: LogLevel, msg: string, meta?: unknown) {
        const payload: LogLine = {
            ts: new Date().toISOString(),
            level,
            name: this.name,
            msg,
        };
        if (meta !== undefined) payload.meta = safeSerialize(meta);
        return JSON.stringify(payload);
    }


    private emit(level: LogLevel, msg: string, meta?: unknown) {
        if (this.should(level)) this.sink(level, this.line(level, msg, meta));
    }


    debug(msg: string, meta?: unknown) {
        this.emit('debug', msg, meta);
    }
    info(msg: string, meta?: unknown) {
        this.emit('info', msg, meta);
    }
    warn(msg: string, meta?: unknown) {
        this.emit('warn', msg, meta);
    }
    error(msg: string, meta?: unknown) {
        this.emit('error', msg, meta);
    }


    // Child names nest under the parent: `harvester:scroll`.
    child(bindings: Partial<{ name: string; level: LogLevel }>) {
        const name = bindings.name ? `${this.name}:${bindings.name}` : this.name;
        return new Logger(bindings.level ?? this.level, name, this.sink);
    }
}
