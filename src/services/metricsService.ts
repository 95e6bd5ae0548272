import type { LeasingSettings } from '../config/settings';
import type { LeasingStore } from '../db/repositories';
import type { LeasingEventBus } from '../events/eventBus';
import type { DailyMetric } from '../leasing/types';
import { localDate, localDayBounds, shiftDate } from '../utils/time';
import { logger } from '../utils/logger';

export interface MetricsTotals {
    total_inquiries: number;
    qualified_leads: number;
    tours_scheduled: number;
    tours_completed: number;
    conversion_rate_qualified: number;
    conversion_rate_tours: number;
}

export interface MetricsSummary {
    from: string;
    to: string;
    days: DailyMetric[];
    totals: MetricsTotals;
}

/** Percentage rounded to two decimals; 0 when there is nothing to divide by. */
export function rate(numerator: number, denominator: number): number {
    if (denominator === 0) return 0;
    return Math.round((numerator / denominator) * 100 * 100) / 100;
}

export interface MetricsServiceDeps {
    store: LeasingStore;
    bus: LeasingEventBus;
    settings: Pick<LeasingSettings, 'timezone'>;
    now: () => Date;
}

export class MetricsService {
    constructor(private readonly deps: MetricsServiceDeps) {}

    today(): string {
        return localDate(this.deps.now(), this.deps.settings.timezone);
    }

    /**
     * Recomputes the row for local day `date` and upserts it. Safe to re-run:
     * the row is replaced, never accumulated.
     */
    async rollup(date: string = this.today()): Promise<DailyMetric> {
        const { store, settings } = this.deps;
        const now = this.deps.now();

        const bounds = localDayBounds(date, settings.timezone);
        const end = bounds.end.getTime() > now.getTime() ? now : bounds.end;
        const start = bounds.start;

        const [totalInquiries, qualifiedLeads, toursScheduled, toursCompleted] = await Promise.all([
            store.leads.countCreatedBetween(start, end),
            store.conversations.countLeadsTransitioned('collecting_profile', 'qualified', start, end),
            store.appointments.countCreatedBetween(start, end),
            store.appointments.countWithStatusScheduledBetween('completed', start, end),
        ]);

        const metric = await store.metrics.upsert(
            {
                date,
                total_inquiries: totalInquiries,
                qualified_leads: qualifiedLeads,
                tours_scheduled: toursScheduled,
                tours_completed: toursCompleted,
                conversion_rate_qualified: rate(qualifiedLeads, totalInquiries),
                conversion_rate_tours: rate(toursScheduled, qualifiedLeads),
            },
            now
        );

        logger.info('Metrics', `Rolled up ${date}`, metric);
        this.deps.bus.emit('metrics:rolled_up', {
            date,
            totalInquiries: metric.total_inquiries,
            qualifiedLeads: metric.qualified_leads,
        });
        return metric;
    }

    /** The last `days` stored rows (newest first) and their totals. */
    async summary(days: number): Promise<MetricsSummary> {
        const to = this.today();
        const from = shiftDate(to, -(days - 1));
        const rows = await this.deps.store.metrics.listBetween(from, to);

        const sum = (pick: (m: DailyMetric) => number) => rows.reduce((acc, m) => acc + pick(m), 0);
        const inquiries = sum((m) => m.total_inquiries);
        const qualified = sum((m) => m.qualified_leads);
        const scheduled = sum((m) => m.tours_scheduled);

        return {
            from,
            to,
            days: rows,
            totals: {
                total_inquiries: inquiries,
                qualified_leads: qualified,
                tours_scheduled: scheduled,
                tours_completed: sum((m) => m.tours_completed),
                conversion_rate_qualified: rate(qualified, inquiries),
                conversion_rate_tours: rate(scheduled, qualified),
            },
        };
    }
}
