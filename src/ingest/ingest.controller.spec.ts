import { HttpException, HttpStatus } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { RedisService } from '../redis';
import { MESSAGE_STORE, MessageStore } from '../storage/storage.contracts';
import { SqliteMessageStore } from '../storage/local/sqlite-message.store';
import { ConversationCache } from '../storage/remote/conversation-cache';
import {
  ConversationResolverService,
} from '../storage/remote/conversation-resolver.service';
import { MessageWriterService } from '../storage/remote/message-writer.service';
import { RemoteMessageStore } from '../storage/remote/remote-message.store';
import { SupabaseRestClient } from '../supabase/supabase-rest.client';
import {
  FakePostgrest,
  TEST_SUPABASE,
} from '../supabase/testing/fake-postgrest';
import { IngestController } from './ingest.controller';
import { IngestService } from './ingest.service';

async function controllerFor(store: MessageStore): Promise<IngestController> {
  const moduleRef = await Test.createTestingModule({
    controllers: [IngestController],
    providers: [
      IngestService,
      RedisService,
      { provide: ConfigService, useValue: new ConfigService({}) },
      { provide: MESSAGE_STORE, useValue: store },
    ],
  }).compile();

  return moduleRef.get(IngestController);
}

describe('IngestController', () => {
  describe('with the local backend', () => {
    let store: SqliteMessageStore;
    let controller: IngestController;

    beforeEach(async () => {
      store = SqliteMessageStore.open(':memory:');
      controller = await controllerFor(store);
    });

    afterEach(async () => {
      await store.close();
    });

    it('stores chat and message events and reads them back', async () => {
      await expect(
        controller.chat({
          jid: '123@x',
          name: 'Alice',
          lastMessageTime: '2024-05-01T10:00:00Z',
        }),
      ).resolves.toEqual({ status: 'stored' });
      await expect(
        controller.message({
          id: 'm1',
          chatJid: '123@x',
          sender: '123@x',
          content: 'hello',
          timestamp: '2024-05-01T10:05:00Z',
          isFromMe: false,
        }),
      ).resolves.toEqual({ status: 'stored' });

      await expect(controller.chats()).resolves.toEqual([
        { jid: '123@x', lastMessageTime: '2024-05-01T10:00:00.000Z' },
      ]);
      const messages = await controller.messages('123@x', { limit: 10 });
      expect(messages.map((m) => m.content)).toEqual(['hello']);
    });

    it('reports an empty message as skipped', async () => {
      await expect(
        controller.message({
          id: 'm2',
          chatJid: '123@x',
          sender: '123@x',
          timestamp: '2024-05-01T10:05:00Z',
          isFromMe: false,
        }),
      ).resolves.toEqual({ status: 'skipped' });
    });

    it('returns media info with binary fields as base64', async () => {
      await controller.message({
        id: 'm3',
        chatJid: '123@x',
        sender: '123@x',
        timestamp: '2024-05-01T10:05:00Z',
        isFromMe: false,
        mediaType: 'image',
        filename: 'photo.jpg',
        url: 'https://media.test/photo',
        mediaKey: Buffer.from('media-key').toString('base64'),
        fileLength: 2048,
      });

      await expect(controller.media('123@x', 'm3')).resolves.toEqual({
        mediaType: 'image',
        filename: 'photo.jpg',
        url: 'https://media.test/photo',
        mediaKey: Buffer.from('media-key').toString('base64'),
        fileSha256: null,
        fileEncSha256: null,
        fileLength: 2048,
      });
    });

    it('answers 404 for a message without media', async () => {
      const attempt = controller.media('123@x', 'missing');

      await expect(attempt).rejects.toBeInstanceOf(HttpException);
      await expect(attempt).rejects.toMatchObject({
        status: HttpStatus.NOT_FOUND,
      });
    });

    it('answers 400 for a chat time that does not parse', async () => {
      const attempt = controller.chat({
        jid: '123@x',
        lastMessageTime: '2024-W10-3',
      });

      await expect(attempt).rejects.toMatchObject({
        status: HttpStatus.BAD_REQUEST,
      });
      await expect(controller.chats()).resolves.toEqual([]);
    });

    it('reports health with the backend and its capabilities', async () => {
      await expect(controller.health()).resolves.toEqual({
        status: 'up',
        backend: 'local',
        capabilities: [
          'storeChat',
          'storeMessage',
          'getMessages',
          'getChats',
          'getMediaInfo',
        ],
        redis: { status: 'up', mode: 'fallback' },
      });
    });
  });

  describe('with the remote backend', () => {
    let fake: FakePostgrest;
    let controller: IngestController;

    beforeEach(async () => {
      fake = new FakePostgrest();
      const rest = new SupabaseRestClient(TEST_SUPABASE, fake.http());
      const cfg = new ConfigService({});
      const redis = new RedisService(cfg);
      const cache = new ConversationCache();
      const resolver = new ConversationResolverService(rest, redis, cache);
      const writer = new MessageWriterService(rest, resolver, redis, cfg);
      controller = await controllerFor(
        new RemoteMessageStore(resolver, writer),
      );
    });

    it('answers 501 for reads the backend cannot serve', async () => {
      const attempt = controller.chats();

      await expect(attempt).rejects.toMatchObject({
        status: HttpStatus.NOT_IMPLEMENTED,
        response: {
          code: 'UNSUPPORTED',
          message: 'getChats is not supported by the remote backend',
        },
      });
    });

    it('answers 400 for a message time that does not parse, before any request', async () => {
      await expect(
        controller.message({
          id: 'm1',
          chatJid: '123@x',
          sender: '123@x',
          content: 'hello',
          timestamp: '2024-W10-3',
          isFromMe: false,
        }),
      ).rejects.toMatchObject({ status: HttpStatus.BAD_REQUEST });
      expect(fake.requests).toHaveLength(0);
    });

    it('still accepts writes', async () => {
      await expect(
        controller.chat({
          jid: '123@x',
          lastMessageTime: '2024-05-01T10:00:00Z',
        }),
      ).resolves.toEqual({ status: 'stored' });
    });
  });
});
