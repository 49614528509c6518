import { createClient, SupabaseClient } from '@supabase/supabase-js';

// SUPABASE_URL and SUPABASE_ANON_KEY come from the environment (.env is loaded by the entry point).
// Only the CLI imports this module; everything else takes the client as an argument.
const supabaseUrl = process.env.SUPABASE_URL;
const supabaseAnonKey = process.env.SUPABASE_ANON_KEY;

if (!supabaseUrl || !supabaseAnonKey) {
  throw new Error('Supabase URL and Anon Key must be provided in environment variables.');
}

export const supabase: SupabaseClient = createClient(supabaseUrl, supabaseAnonKey);
