import { Injectable } from '@nestjs/common';

/**
 * Process-local map of contact identifier -> conversation id.
 *
 * Entries are hints filled from authoritative resolutions; they never
 * expire and are not shared between instances. A create decision is never
 * taken from the cache alone.
 */
@Injectable()
export class ConversationCache {
  private readonly ids = new Map<string, string>();

  get(contactIdentifier: string): string | undefined {
    return this.ids.get(contactIdentifier);
  }

  set(contactIdentifier: string, conversationId: string): void {
    this.ids.set(contactIdentifier, conversationId);
  }

  delete(contactIdentifier: string): boolean {
    return this.ids.delete(contactIdentifier);
  }

  get size(): number {
    return this.ids.size;
  }
}
