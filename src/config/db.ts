import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { logger } from '../utils/logger';

export function createDbClient(url: string, serviceRoleKey: string): SupabaseClient {
    const db = createClient(url, serviceRoleKey, {
        auth: {
            autoRefreshToken: false,
            persistSession: false,
        },
    });

    logger.success('DB', 'Supabase client initialised');
    return db;
}
