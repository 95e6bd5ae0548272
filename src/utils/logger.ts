const COLORS = {
    reset: '\x1b[0m',
    grey: '\x1b[90m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    bold: '\x1b[1m',
};

type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug' | 'event' | 'worker';

const LEVEL_CONFIG: Record<LogLevel, { color: string; icon: string; label: string; rank: number }> = {
    debug: { color: COLORS.grey, icon: '🔍', label: 'DEBUG  ', rank: 0 },
    info: { color: COLORS.blue, icon: 'ℹ', label: 'INFO   ', rank: 1 },
    success: { color: COLORS.green, icon: '✅', label: 'SUCCESS', rank: 1 },
    event: { color: COLORS.magenta, icon: '📡', label: 'EVENT  ', rank: 1 },
    worker: { color: COLORS.cyan, icon: '⚙️', label: 'WORKER ', rank: 1 },
    warn: { color: COLORS.yellow, icon: '⚠️', label: 'WARN   ', rank: 2 },
    error: { color: COLORS.red, icon: '❌', label: 'ERROR  ', rank: 3 },
};

// LOG_LEVEL names the lowest rank printed: debug | info | warn | error
const FLOOR_BY_NAME: Record<string, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function floorRank(): number {
    const configured = process.env.LOG_LEVEL?.toLowerCase();
    if (configured && configured in FLOOR_BY_NAME) return FLOOR_BY_NAME[configured];
    return process.env.NODE_ENV === 'production' ? 1 : 0;
}

function formatTimestamp(): string {
    return new Date().toISOString().replace('T', ' ').replace('Z', '');
}

function log(level: LogLevel, context: string, message: string, meta?: unknown): void {
    const cfg = LEVEL_CONFIG[level];
    if (cfg.rank < floorRank()) return;

    const ts = `${COLORS.grey}${formatTimestamp()}${COLORS.reset}`;
    const lvl = `${cfg.color}${COLORS.bold}[${cfg.label}]${COLORS.reset}`;
    const ctx = `${COLORS.grey}[${context}]${COLORS.reset}`;
    const msg = `${cfg.icon}  ${message}`;
    const write = level === 'error' ? console.error : console.log;

    if (meta !== undefined) {
        write(`${ts} ${lvl} ${ctx} ${msg}`, meta);
    } else {
        write(`${ts} ${lvl} ${ctx} ${msg}`);
    }
}

export const logger = {
    info: (ctx: string, msg: string, meta?: unknown) => log('info', ctx, msg, meta),
    success: (ctx: string, msg: string, meta?: unknown) => log('success', ctx, msg, meta),
    warn: (ctx: string, msg: string, meta?: unknown) => log('warn', ctx, msg, meta),
    error: (ctx: string, msg: string, meta?: unknown) => log('error', ctx, msg, meta),
    debug: (ctx: string, msg: string, meta?: unknown) => log('debug', ctx, msg, meta),
    event: (ctx: string, msg: string, meta?: unknown) => log('event', ctx, msg, meta),
    worker: (ctx: string, msg: string, meta?: unknown) => log('worker', ctx, msg, meta),
};
