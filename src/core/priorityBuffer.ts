import type { PriorityLookup } from "../config/sourceTables";
import type { BufferRow, DisplayMessage } from "../types/display";
import { DEFAULT_IDENTITY, isSameEvent, type IdentityOptions } from "./messageIdentity";

export interface PriorityBufferOptions {
  capacity: number;
  priorityOf: PriorityLookup;
  identity?: IdentityOptions;
}

export interface ExpirySweepResult {
  expired: DisplayMessage[];
  currentExpired: boolean;
}

interface Slot {
  message: DisplayMessage;
  /** Insertion token; survives in-place replacement so the slot keeps its round-robin position. */
  readonly order: number;
}

/**
 * Bounded list ordered by (source priority, insertion token) with a round-robin cursor.
 * The cursor follows a slot token rather than an index, so re-sorting never loses it.
 */
export class PriorityBuffer {
  private slots: Slot[] = [];
  private nextOrder = 0;
  private currentOrder: number | null = null;
  private readonly identity: IdentityOptions;

  constructor(private readonly options: PriorityBufferOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new Error(`Buffer capacity must be a positive integer, got ${options.capacity}`);
    }
    this.identity = options.identity ?? DEFAULT_IDENTITY;
  }

  get size(): number {
    return this.slots.length;
  }

  get capacity(): number {
    return this.options.capacity;
  }

  isEmpty(): boolean {
    return this.slots.length === 0;
  }

  add(message: DisplayMessage): void {
    this.append(message);
    this.sort();
  }

  replaceOrAdd(message: DisplayMessage): boolean {
    const replaced = this.upsert(message, (slot) => this.sameEvent(slot.message, message));
    this.sort();
    return replaced;
  }

  /** Deduplicates by (eventId, source) inside the batch; first occurrence wins. */
  batchReplaceOrAdd(messages: readonly DisplayMessage[]): boolean[] {
    const outcome = new Map<string, boolean>();
    const keys = messages.map((message) =>
      message.eventId ? `${message.source}\u0000${message.eventId}` : `#${message.id}`
    );

    messages.forEach((message, index) => {
      const key = keys[index] ?? `#${message.id}`;
      if (outcome.has(key)) return;
      outcome.set(key, this.upsert(message, (slot) => this.sameEvent(slot.message, message)));
    });

    this.sort();
    return keys.map((key) => outcome.get(key) ?? false);
  }

  replaceBySource(message: DisplayMessage): boolean {
    const replaced = this.upsert(message, (slot) => slot.message.source === message.source);
    this.sort();
    return replaced;
  }

  /** Keeps one message per source from the batch (latest `createdAt`, later arrival on ties). */
  batchReplaceBySource(messages: readonly DisplayMessage[]): boolean[] {
    const winners = new Map<string, DisplayMessage>();
    for (const message of messages) {
      const existing = winners.get(message.source);
      if (!existing) {
        winners.set(message.source, message);
      } else if (message.createdAt >= existing.createdAt) {
        this.inherit(existing, message);
        winners.set(message.source, message);
      } else {
        this.inherit(message, existing);
      }
    }

    const outcome = new Map<string, boolean>();
    for (const [source, message] of winners) {
      outcome.set(source, this.upsert(message, (slot) => slot.message.source === source));
    }

    this.sort();
    return messages.map((message) => outcome.get(message.source) ?? false);
  }

  findBySource(source: string): DisplayMessage | undefined {
    return this.slots.find((slot) => slot.message.source === source)?.message;
  }

  findByEventId(eventId: string, source?: string): DisplayMessage | undefined {
    if (!eventId) return undefined;
    return this.slots.find(
      (slot) => slot.message.eventId === eventId && (source === undefined || slot.message.source === source)
    )?.message;
  }

  findById(id: number): DisplayMessage | undefined {
    return this.slots.find((slot) => slot.message.id === id)?.message;
  }

  /** Removes every entry of `source` carrying `eventId`; returns how many were removed. */
  removeByEventId(eventId: string, source: string): number {
    if (!eventId) return 0;
    return this.removeWhere((message) => message.eventId === eventId && message.source === source).length;
  }

  removeById(id: number): boolean {
    return this.removeWhere((message) => message.id === id).length > 0;
  }

  removeWhere(predicate: (message: DisplayMessage) => boolean): DisplayMessage[] {
    const removed: DisplayMessage[] = [];
    const kept: Slot[] = [];
    for (const slot of this.slots) {
      if (predicate(slot.message)) {
        removed.push(slot.message);
        if (slot.order === this.currentOrder) this.currentOrder = null;
      } else {
        kept.push(slot);
      }
    }
    this.slots = kept;
    return removed;
  }

  expirySweep(isValid: (message: DisplayMessage) => boolean): ExpirySweepResult {
    const current = this.getCurrent();
    const expired = this.removeWhere((message) => !isValid(message));
    return {
      expired,
      currentExpired: current !== undefined && expired.includes(current)
    };
  }

  /** Advances the cursor to the entry after the displayed one, wrapping to the head. */
  getNext(): DisplayMessage | undefined {
    this.sort();
    if (this.slots.length === 0) return undefined;
    const index = this.slots.findIndex((slot) => slot.order === this.currentOrder);
    const next = this.slots[index >= 0 ? (index + 1) % this.slots.length : 0];
    if (!next) return undefined;
    this.currentOrder = next.order;
    return next.message;
  }

  getCurrent(): DisplayMessage | undefined {
    if (this.currentOrder === null) return undefined;
    return this.slots.find((slot) => slot.order === this.currentOrder)?.message;
  }

  markDisplayed(id: number): boolean {
    return this.markDisplayedWhere((message) => message.id === id) !== undefined;
  }

  markDisplayedWhere(predicate: (message: DisplayMessage) => boolean): DisplayMessage | undefined {
    const slot = this.slots.find((candidate) => predicate(candidate.message));
    if (!slot) return undefined;
    this.currentOrder = slot.order;
    return slot.message;
  }

  resetCursor(): void {
    this.currentOrder = null;
  }

  peekFirst(): DisplayMessage | undefined {
    return this.slots[0]?.message;
  }

  messages(): readonly DisplayMessage[] {
    return this.slots.map((slot) => slot.message);
  }

  snapshot(): BufferRow[] {
    return this.slots.map((slot) => ({
      id: slot.message.id,
      source: slot.message.source,
      messageType: slot.message.messageType,
      text: slot.message.text,
      color: slot.message.color,
      current: slot.order === this.currentOrder
    }));
  }

  clear(): void {
    this.slots = [];
    this.currentOrder = null;
  }

  private sameEvent(a: DisplayMessage, b: DisplayMessage): boolean {
    return isSameEvent(a, b, this.identity);
  }

  private upsert(message: DisplayMessage, matches: (slot: Slot) => boolean): boolean {
    const index = this.slots.findIndex(matches);
    const existing = this.slots[index];
    if (!existing) {
      this.append(message);
      return false;
    }
    this.inherit(existing.message, message);
    this.slots[index] = { message, order: existing.order };
    return true;
  }

  private append(message: DisplayMessage): void {
    if (this.slots.length >= this.options.capacity) {
      const evicted = this.slots.shift();
      if (evicted && evicted.order === this.currentOrder) this.currentOrder = null;
    }
    this.nextOrder += 1;
    this.slots.push({ message, order: this.nextOrder });
  }

  /** Carries display bookkeeping from a superseded message onto its replacement. */
  private inherit(previous: DisplayMessage, next: DisplayMessage): void {
    if (next.firstDisplayedAt === null && previous.firstDisplayedAt !== null && this.sameEvent(previous, next)) {
      next.firstDisplayedAt = previous.firstDisplayedAt;
    }
    if (next.messageType === "weather" && !next.imageRef && previous.imageRef) {
      next.imageRef = previous.imageRef;
    }
  }

  private sort(): void {
    const priorityOf = this.options.priorityOf;
    this.slots.sort((a, b) => priorityOf(a.message.source) - priorityOf(b.message.source) || a.order - b.order);
  }
}
