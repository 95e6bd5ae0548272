import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { shiftDate } from '../../utils/time';
import { logger } from '../../utils/logger';
import type { MemoryUnitRepository } from './memoryStore';

const CatalogSchema = z.object({
    properties: z.array(z.object({ id: z.number().int(), name: z.string(), address: z.string() })),
    units: z.array(
        z.object({
            id: z.number().int(),
            property_id: z.number().int(),
            unit_number: z.string(),
            rooms: z.number().int().positive(),
            floor: z.number().int().nullable(),
            price: z.number().positive(),
            has_parking: z.boolean(),
            furnished: z.boolean(),
            pet_friendly: z.boolean(),
            status: z.enum(['available', 'hold', 'rented']).default('available'),
            /** Days after the seeding date; null means available now. */
            available_in_days: z.number().int().nonnegative().nullable(),
        })
    ),
});

export type Catalog = z.input<typeof CatalogSchema>;

export const SAMPLE_CATALOG_PATH = path.resolve(__dirname, '../../../data/sample-catalog.json');

export function loadCatalogFile(file: string = SAMPLE_CATALOG_PATH): Catalog {
    const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
    return CatalogSchema.parse(raw);
}

/** Loads properties and units into the in-process store, dating availability from `today`. */
export function seedCatalog(units: MemoryUnitRepository, catalog: Catalog, today: string): void {
    const parsed = CatalogSchema.parse(catalog);

    for (const property of parsed.properties) units.addProperty(property);
    for (const { available_in_days, ...unit } of parsed.units) {
        units.addUnit({
            ...unit,
            available_from: available_in_days === null ? null : shiftDate(today, available_in_days),
        });
    }

    logger.debug('Catalog', `Seeded ${parsed.properties.length} properties / ${parsed.units.length} units`);
}
