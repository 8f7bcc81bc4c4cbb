import { createClient, SupabaseClient } from '@supabase/supabase-js';
import axios, { AxiosInstance } from 'axios';
import { ConfigService } from './ConfigService.js';

/**
 * Client Factory - Responsible for creating and managing external service clients
 */
export class ClientFactory {
  private config: ConfigService;

  constructor(configService: ConfigService) {
    this.config = configService;
  }

  /**
   * Service-role client used by the task store. Sessions are not persisted;
   * the worker has no user of its own.
   */
  createSupabaseClient(): SupabaseClient {
    const { url, serviceRoleKey } = this.config.getSupabaseConfig();
    if (!url || !serviceRoleKey) {
      throw new Error('Supabase environment variables are not set');
    }
    return createClient(url, serviceRoleKey, {
      auth: { persistSession: false, autoRefreshToken: false }
    });
  }

  /**
   * Anon-key client used only to resolve bearer tokens to users.
   */
  createAuthClient(): SupabaseClient {
    const { url, anonKey } = this.config.getSupabaseConfig();
    if (!url || !anonKey) {
      throw new Error('SUPABASE_URL and SUPABASE_ANON_KEY are required for authentication');
    }
    return createClient(url, anonKey, {
      auth: { persistSession: false, autoRefreshToken: false }
    });
  }

  createAxiosClient(): AxiosInstance {
    return axios.create();
  }
}
