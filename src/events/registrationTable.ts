import type { ListenerId, MessageTypeKey } from '../types.js';
import type { ErasedCallback } from './erasedCallback.js';

export interface CallbackGroup {
  readonly listenerId: ListenerId;
  readonly callbacks: ErasedCallback[];
}

/**
 * Message type key -> callback groups, one group per listener, in the order the
 * listeners first subscribed to that type.
 *
 * Never holds an empty group or a type entry without groups.
 */
export class RegistrationTable {
  private groupsByType: Map<MessageTypeKey, CallbackGroup[]> = new Map();
  // Reverse index so removing a listener only visits the types it subscribed to.
  private typesByListener: Map<ListenerId, Set<MessageTypeKey>> = new Map();

  add(key: MessageTypeKey, listenerId: ListenerId, callback: ErasedCallback): void {
    let groups = this.groupsByType.get(key);
    if (!groups) {
      groups = [];
      this.groupsByType.set(key, groups);
    }

    let group = groups.find(g => g.listenerId === listenerId);
    if (!group) {
      group = { listenerId, callbacks: [] };
      groups.push(group);
    }
    group.callbacks.push(callback);

    let types = this.typesByListener.get(listenerId);
    if (!types) {
      types = new Set();
      this.typesByListener.set(listenerId, types);
    }
    types.add(key);
  }

  /** Drop one listener's group for one type. Returns whether anything was removed. */
  removeListener(key: MessageTypeKey, listenerId: ListenerId): boolean {
    const groups = this.groupsByType.get(key);
    if (!groups) return false;

    const index = groups.findIndex(g => g.listenerId === listenerId);
    if (index === -1) return false;

    groups.splice(index, 1);
    if (groups.length === 0) this.groupsByType.delete(key);
    this.forgetType(listenerId, key);
    return true;
  }

  /** Drop every group the listener owns. Returns the number of types it left. */
  removeListenerEverywhere(listenerId: ListenerId): number {
    const types = this.typesByListener.get(listenerId);
    if (!types) return 0;

    let removed = 0;
    for (const key of Array.from(types)) {
      if (this.removeListener(key, listenerId)) removed++;
    }
    this.typesByListener.delete(listenerId);
    return removed;
  }

  /** Drop a single registration; an emptied group goes with it. */
  removeCallback(key: MessageTypeKey, listenerId: ListenerId, callback: ErasedCallback): boolean {
    const group = this.groupsByType.get(key)?.find(g => g.listenerId === listenerId);
    if (!group) return false;

    const index = group.callbacks.indexOf(callback);
    if (index === -1) return false;

    group.callbacks.splice(index, 1);
    if (group.callbacks.length === 0) this.removeListener(key, listenerId);
    return true;
  }

  /**
   * The callbacks for a type in dispatch order (groups first, then within each
   * group), copied so callers may change the table while walking it.
   */
  snapshot(key: MessageTypeKey): ErasedCallback[] {
    const groups = this.groupsByType.get(key);
    if (!groups) return [];
    return groups.flatMap(g => g.callbacks);
  }

  forEach(key: MessageTypeKey, visitor: (callback: ErasedCallback) => void): void {
    for (const callback of this.snapshot(key)) {
      visitor(callback);
    }
  }

  has(key: MessageTypeKey): boolean {
    return this.groupsByType.has(key);
  }

  groupCount(key: MessageTypeKey): number {
    return this.groupsByType.get(key)?.length ?? 0;
  }

  callbackCount(key: MessageTypeKey): number {
    const groups = this.groupsByType.get(key);
    if (!groups) return 0;
    return groups.reduce((total, g) => total + g.callbacks.length, 0);
  }

  get typeCount(): number {
    return this.groupsByType.size;
  }

  typesOf(listenerId: ListenerId): MessageTypeKey[] {
    return Array.from(this.typesByListener.get(listenerId) ?? []);
  }

  private forgetType(listenerId: ListenerId, key: MessageTypeKey): void {
    const types = this.typesByListener.get(listenerId);
    if (!types) return;
    types.delete(key);
    if (types.size === 0) this.typesByListener.delete(listenerId);
  }
}
