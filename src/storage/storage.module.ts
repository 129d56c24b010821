import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_DB_PATH, StorageBackend } from '../config/configuration';
import { SupabaseModule } from '../supabase/supabase.module';
import { MESSAGE_STORE } from './storage.contracts';
import { SqliteMessageStore } from './local/sqlite-message.store';
import { ConversationCache } from './remote/conversation-cache';
import {
  ConversationResolverService,
} from './remote/conversation-resolver.service';
import { MessageWriterService } from './remote/message-writer.service';
import { RemoteMessageStore } from './remote/remote-message.store';

/**
 * Binds MESSAGE_STORE to the backend chosen at startup. Only the chosen
 * backend's providers are created, so the local backend boots without
 * Supabase settings.
 */
@Module({})
export class StorageModule {
  static register(backend: StorageBackend): DynamicModule {
    if (backend === 'local') {
      return {
        module: StorageModule,
        global: true,
        providers: [
          {
            provide: MESSAGE_STORE,
            useFactory: (cfg: ConfigService) =>
              SqliteMessageStore.open(
                cfg.get<string>('MESSAGES_DB_PATH') || DEFAULT_DB_PATH,
              ),
            inject: [ConfigService],
          },
        ],
        exports: [MESSAGE_STORE],
      };
    }

    return {
      module: StorageModule,
      global: true,
      imports: [SupabaseModule],
      providers: [
        ConversationCache,
        ConversationResolverService,
        MessageWriterService,
        RemoteMessageStore,
        { provide: MESSAGE_STORE, useExisting: RemoteMessageStore },
      ],
      exports: [MESSAGE_STORE],
    };
  }
}
