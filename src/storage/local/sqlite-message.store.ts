import * as fs from 'fs';
import { dirname } from 'path';
import { Logger, OnModuleDestroy } from '@nestjs/common';
import Database from 'better-sqlite3';
import type { StorageBackend } from '../../config/configuration';
import {
  MediaInfo,
  MessageStore,
  StoreCapability,
  StoreMessageInput,
  StoreMessageOutcome,
  StoredMessage,
  isEmptyMessage,
} from '../storage.contracts';
import { MediaInfoUnavailableError } from '../storage.errors';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS chats (
    jid TEXT PRIMARY KEY,
    name TEXT,
    last_message_time TEXT
  );

  CREATE TABLE IF NOT EXISTS messages (
    id TEXT NOT NULL,
    chat_jid TEXT NOT NULL,
    sender TEXT,
    content TEXT,
    timestamp TEXT,
    is_from_me INTEGER,
    media_type TEXT,
    filename TEXT,
    url TEXT,
    media_key BLOB,
    file_sha256 BLOB,
    file_enc_sha256 BLOB,
    file_length INTEGER,
    PRIMARY KEY (id, chat_jid)
  );

  CREATE INDEX IF NOT EXISTS idx_messages_chat_time
    ON messages (chat_jid, timestamp);
`;

interface MessageRow {
  id: string;
  chat_jid: string;
  sender: string | null;
  content: string | null;
  timestamp: string;
  is_from_me: number;
  media_type: string | null;
  filename: string | null;
}

interface MediaRow {
  media_type: string | null;
  filename: string | null;
  url: string | null;
  media_key: Buffer | null;
  file_sha256: Buffer | null;
  file_enc_sha256: Buffer | null;
  file_length: number | null;
}

interface ChatRow {
  jid: string;
  last_message_time: string | null;
}

/**
 * Embedded SQLite backend. Keeps every field of a message event,
 * including media file metadata, and answers all read operations.
 */
export class SqliteMessageStore implements MessageStore, OnModuleDestroy {
  readonly backend: StorageBackend = 'local';
  readonly capabilities: ReadonlySet<StoreCapability> =
    new Set<StoreCapability>([
      'storeChat',
      'storeMessage',
      'getMessages',
      'getChats',
      'getMediaInfo',
    ]);

  private readonly log = new Logger(SqliteMessageStore.name);
  private closed = false;

  constructor(private readonly db: Database.Database) {
    this.db.exec(SCHEMA);
  }

  static open(dbPath: string): SqliteMessageStore {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    return new SqliteMessageStore(db);
  }

  async storeChat(
    jid: string,
    name: string,
    lastMessageTime: Date,
  ): Promise<void> {
    this.db
      .prepare<[string, string | null, string]>(
        `INSERT INTO chats (jid, name, last_message_time) VALUES (?, ?, ?)
         ON CONFLICT(jid) DO UPDATE SET
           name = COALESCE(excluded.name, chats.name),
           last_message_time = excluded.last_message_time`,
      )
      .run(jid, name || null, lastMessageTime.toISOString());
  }

  async storeMessage(input: StoreMessageInput): Promise<StoreMessageOutcome> {
    if (isEmptyMessage(input.content, input.mediaType)) {
      return 'skipped';
    }

    const timestamp = input.timestamp.toISOString();
    const insert = this.db.transaction(() => {
      this.db
        .prepare<[string, string]>(
          `INSERT INTO chats (jid, last_message_time) VALUES (?, ?)
           ON CONFLICT(jid) DO NOTHING`,
        )
        .run(input.chatJid, timestamp);

      this.db
        .prepare(
          `INSERT OR REPLACE INTO messages (
             id, chat_jid, sender, content, timestamp, is_from_me,
             media_type, filename, url, media_key,
             file_sha256, file_enc_sha256, file_length
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          input.id,
          input.chatJid,
          input.sender,
          input.content,
          timestamp,
          input.isFromMe ? 1 : 0,
          input.mediaType ?? null,
          input.filename ?? null,
          input.url ?? null,
          input.mediaKey ?? null,
          input.fileSha256 ?? null,
          input.fileEncSha256 ?? null,
          input.fileLength ?? null,
        );
    });
    insert();

    return 'stored';
  }

  async getMessages(chatJid: string, limit: number): Promise<StoredMessage[]> {
    const rows = this.db
      .prepare<[string, number], MessageRow>(
        `SELECT id, chat_jid, sender, content, timestamp, is_from_me,
                media_type, filename
         FROM messages WHERE chat_jid = ? ORDER BY timestamp DESC LIMIT ?`,
      )
      .all(chatJid, limit);

    return rows.map((row) => ({
      id: row.id,
      chatJid: row.chat_jid,
      sender: row.sender ?? '',
      content: row.content ?? '',
      timestamp: new Date(row.timestamp),
      isFromMe: row.is_from_me === 1,
      mediaType: row.media_type,
      filename: row.filename,
    }));
  }

  async getChats(): Promise<Map<string, Date>> {
    const rows = this.db
      .prepare<[], ChatRow>(
        `SELECT jid, last_message_time FROM chats
         ORDER BY last_message_time DESC`,
      )
      .all();

    const chats = new Map<string, Date>();
    for (const row of rows) {
      if (row.last_message_time) {
        chats.set(row.jid, new Date(row.last_message_time));
      }
    }
    return chats;
  }

  async getMediaInfo(id: string, chatJid: string): Promise<MediaInfo> {
    const row = this.db
      .prepare<[string, string], MediaRow>(
        `SELECT media_type, filename, url, media_key,
                file_sha256, file_enc_sha256, file_length
         FROM messages WHERE id = ? AND chat_jid = ?`,
      )
      .get(id, chatJid);

    if (!row) {
      throw new MediaInfoUnavailableError(id, chatJid, 'message not found');
    }
    if (!row.media_type) {
      throw new MediaInfoUnavailableError(id, chatJid, 'message has no media');
    }

    return {
      mediaType: row.media_type,
      filename: row.filename ?? '',
      url: row.url ?? '',
      mediaKey: row.media_key,
      fileSha256: row.file_sha256,
      fileEncSha256: row.file_enc_sha256,
      fileLength: row.file_length ?? 0,
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
    this.log.log('SQLite store closed');
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }
}
