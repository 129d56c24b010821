/** Channel value written on every row this backend creates. */
export const CHANNEL = 'whatsapp';

export type Direction = 'inbound' | 'outbound';

export const INITIAL_STATUS = 'active';

/** Row of the `conversations` resource. */
export interface ConversationRecord {
  id?: string;
  channel: string;
  contact_identifier: string;
  contact_name?: string;
  last_message_at?: string;
  status: string;
  unread_count?: number;
}

/** Row of the `messages` resource. */
export interface MessageRecord {
  id?: string;
  conversation_id: string;
  channel: string;
  direction: Direction;
  sender: string;
  recipient: string;
  body?: string;
  external_id?: string;
  metadata?: Record<string, unknown>;
  is_read?: boolean;
  status?: string;
}

export function directionOf(isFromMe: boolean): Direction {
  return isFromMe ? 'outbound' : 'inbound';
}
