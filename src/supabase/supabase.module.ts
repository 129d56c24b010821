// src/supabase/supabase.module.ts
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { SupabaseRestClient } from './supabase-rest.client';

export const SUPABASE_HTTP = 'SUPABASE_HTTP';

@Module({
  providers: [
    {
      provide: SUPABASE_HTTP,
      useFactory: (): AxiosInstance => axios.create(),
    },
    {
      provide: SupabaseRestClient,
      // Throws StoreConfigError when SUPABASE_URL or SUPABASE_KEY is unset,
      // which aborts bootstrap.
      useFactory: (cfg: ConfigService, http: AxiosInstance) =>
        SupabaseRestClient.fromEnv((key) => cfg.get<string>(key), http),
      inject: [ConfigService, SUPABASE_HTTP],
    },
  ],
  exports: [SupabaseRestClient],
})
export class SupabaseModule {}
