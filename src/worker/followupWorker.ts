import type { DispatchSummary, FollowupService } from '../services/followupService';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface WorkerStatus {
    running: boolean;
    busy: boolean;
    passes: number;
    lastRunAt: string | null;
    lastError: string | null;
    lastSummary: DispatchSummary | null;
}

/** Polls for due followups. A pass that is still running makes the next tick a no-op. */
export class FollowupWorker {
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    private state: WorkerStatus = {
        running: false,
        busy: false,
        passes: 0,
        lastRunAt: null,
        lastError: null,
        lastSummary: null,
    };

    constructor(
        private readonly followups: FollowupService,
        private readonly intervalMs: number,
        private readonly now: () => Date = () => new Date()
    ) {}

    start(): void {
        if (this.timer) return;
        this.timer = setInterval(() => {
            void this.tick();
        }, this.intervalMs);
        this.timer.unref();
        this.state.running = true;
        logger.worker('FollowupWorker', `Polling every ${Math.round(this.intervalMs / 1000)}s`);
    }

    /** Runs one pass unless one is already in flight. */
    async tick(): Promise<void> {
        if (this.inFlight) {
            logger.debug('FollowupWorker', 'Previous pass still running — skipping tick');
            return;
        }

        this.state.busy = true;
        this.inFlight = this.followups
            .dispatchDue(this.now())
            .then((summary) => {
                this.state.lastSummary = summary;
                this.state.lastError = null;
            })
            .catch((err: unknown) => {
                this.state.lastError = errorMessage(err);
                logger.error('FollowupWorker', `Pass failed: ${this.state.lastError}`);
            })
            .finally(() => {
                this.state.passes += 1;
                this.state.lastRunAt = this.now().toISOString();
                this.state.busy = false;
                this.inFlight = null;
            });

        await this.inFlight;
    }

    async stop(): Promise<void> {
        if (this.timer) clearInterval(this.timer);
        this.timer = null;
        this.state.running = false;

        if (this.inFlight) {
            logger.worker('FollowupWorker', 'Draining in-flight pass…');
            await this.inFlight;
        }
        logger.worker('FollowupWorker', 'Stopped');
    }

    status(): WorkerStatus {
        return { ...this.state };
    }
}
