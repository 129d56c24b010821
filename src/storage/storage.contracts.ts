import type { StorageBackend } from '../config/configuration';

export const MESSAGE_STORE = 'MESSAGE_STORE';

export type StoreCapability =
  | 'storeChat'
  | 'storeMessage'
  | 'getMessages'
  | 'getChats'
  | 'getMediaInfo';

export type StoreMessageOutcome = 'stored' | 'skipped' | 'duplicate';

/**
 * A message event as the messaging client emits it. The media file fields
 * only matter to backends that keep media metadata as columns.
 */
export interface StoreMessageInput {
  id: string;
  chatJid: string;
  sender: string;
  /** Defaults to the chat identifier. */
  recipient?: string;
  content: string;
  timestamp: Date;
  isFromMe: boolean;
  mediaType?: string;
  filename?: string;
  url?: string;
  mediaKey?: Buffer;
  fileSha256?: Buffer;
  fileEncSha256?: Buffer;
  fileLength?: number;
}

export interface StoredMessage {
  id: string;
  chatJid: string;
  sender: string;
  content: string;
  timestamp: Date;
  isFromMe: boolean;
  mediaType: string | null;
  filename: string | null;
}

export interface MediaInfo {
  mediaType: string;
  filename: string;
  url: string;
  mediaKey: Buffer | null;
  fileSha256: Buffer | null;
  fileEncSha256: Buffer | null;
  fileLength: number;
}

/**
 * Storage capability set the ingestion pipeline is written against.
 *
 * Backends may be partial: an operation outside `capabilities` rejects with
 * UnsupportedByBackendError, never with an empty result.
 */
export interface MessageStore {
  readonly backend: StorageBackend;
  readonly capabilities: ReadonlySet<StoreCapability>;

  storeChat(jid: string, name: string, lastMessageTime: Date): Promise<void>;
  storeMessage(input: StoreMessageInput): Promise<StoreMessageOutcome>;
  getMessages(chatJid: string, limit: number): Promise<StoredMessage[]>;
  getChats(): Promise<Map<string, Date>>;
  getMediaInfo(id: string, chatJid: string): Promise<MediaInfo>;
  close(): Promise<void>;
}

/** Empty content with no media is never persisted by any backend. */
export function isEmptyMessage(content: string, mediaType?: string): boolean {
  return !content && !mediaType;
}
