import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { PersistenceConfig } from '../config/env';
import { Logger } from '../utils/logger';

export type EventLevel = 'INFO' | 'WARN' | 'ERROR';

/** Pushes an operational event to `bot_events`. Never throws. */
export type LogEvent = (level: EventLevel, message: string) => Promise<void>;

// Service role key: the bot runs server-side and writes past RLS.
export function createSupabase(config: PersistenceConfig): SupabaseClient {
  return createClient(config.supabaseUrl, config.supabaseServiceKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
}

export function createEventLog(client: SupabaseClient, botId: string): LogEvent {
  return async (level, message) => {
    try {
      const { error } = await client.from('bot_events').insert({
        level,
        message: `[${botId}] ${message}`,
      });
      if (error) Logger.error('Failed to push log to Supabase', error.message);
    } catch (err) {
      Logger.error('Failed to push log to Supabase', err);
    }
  };
}
