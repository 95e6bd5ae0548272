import type { MetricsService } from '../services/metricsService';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { atLocalHour, localDate, shiftDate } from '../utils/time';

/** Next instant the local clock in `timeZone` shows `hhmm`, strictly after `now`. */
export function nextRunAt(now: Date, hhmm: string, timeZone: string): Date {
    const [hour, minute] = hhmm.split(':').map(Number);
    const today = localDate(now, timeZone);
    const candidate = atLocalHour(today, hour, timeZone, minute);
    return candidate.getTime() > now.getTime() ? candidate : atLocalHour(shiftDate(today, 1), hour, timeZone, minute);
}

/** Runs the daily rollup for the local day at METRICS_ROLLUP_TIME. */
export class MetricsJob {
    private timer: NodeJS.Timeout | null = null;

    constructor(
        private readonly metrics: MetricsService,
        private readonly rollupTime: string,
        private readonly timeZone: string,
        private readonly now: () => Date = () => new Date()
    ) {}

    start(): void {
        if (this.timer) return;
        this.arm();
    }

    private arm(): void {
        const at = nextRunAt(this.now(), this.rollupTime, this.timeZone);
        const delay = Math.max(0, at.getTime() - this.now().getTime());
        logger.worker('MetricsJob', `Next rollup at ${at.toISOString()}`);

        this.timer = setTimeout(() => {
            void this.run().finally(() => {
                if (this.timer) this.arm();
            });
        }, delay);
        this.timer.unref();
    }

    async run(): Promise<void> {
        try {
            await this.metrics.rollup();
        } catch (err) {
            logger.error('MetricsJob', `Rollup failed: ${errorMessage(err)}`);
        }
    }

    stop(): void {
        if (this.timer) clearTimeout(this.timer);
        this.timer = null;
    }
}
