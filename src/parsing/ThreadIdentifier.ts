/**
 * Thread Identifier
 * Assigns conversation thread ids to messages one at a time, using reference
 * tokens first, then normalized subjects, then a singleton fallback.
 *
 * Reference bindings behave as an incremental union-find: once a reference is
 * bound it keeps resolving to the same thread, and a message that links two
 * existing threads unites them under the earliest-minted id.
 */

import logger from '../utils/logger';
import { MESSAGE_ID_PATTERN } from './EmailParser';
import { ThreadableMessage, ThreadIdKind, ThreadMerge } from './types';

const SUBJECT_PREFIX_PATTERNS: RegExp[] = [
  /^re:\s*/i,
  /^fwd:\s*/i,
  /^fw:\s*/i,
  /^reply:\s*/i,
  /^\[\w+\]\s*/, // [tag]
];

export class ThreadIdentifier {
  /** thread id -> member references */
  private readonly threads = new Map<string, Set<string>>();
  /** normalized subject -> thread id */
  private readonly subjectThreads = new Map<string, string>();
  /** reference (message id) -> thread id it was bound to */
  private readonly referenceMap = new Map<string, string>();
  private readonly parent = new Map<string, string>();
  private readonly mintOrder = new Map<string, number>();
  private readonly normalizedCache = new Map<string, string>();
  private pendingMerges: ThreadMerge[] = [];
  private nextThreadId = 1;

  /**
   * Thread id for a message, or null when it has no message id at all
   */
  identifyThread(message: ThreadableMessage | null | undefined): string | null {
    if (!message) {
      return null;
    }

    const messageId = (message.message_id ?? '').trim();
    if (!messageId) {
      return null;
    }

    const references = this.extractReferences(message, messageId);
    const keys = [messageId, ...references];

    const bound = this.boundRoots(keys);
    if (bound.length > 0) {
      const threadId = this.unite(bound);
      this.bind(threadId, keys);
      return threadId;
    }

    if (references.length > 0) {
      const threadId = this.mint('thread', messageId);
      this.bind(threadId, keys);
      return threadId;
    }

    const normalizedSubject = this.normalizeSubject(message.subject ?? '');
    if (normalizedSubject) {
      const existing = this.subjectThreads.get(normalizedSubject);
      const threadId = existing ? this.find(existing) : this.mint('subject', messageId);
      if (!existing) {
        this.subjectThreads.set(normalizedSubject, threadId);
      }
      this.bind(threadId, [messageId]);
      return threadId;
    }

    const threadId = this.mint('singleton', messageId);
    this.bind(threadId, [messageId]);
    return threadId;
  }

  /**
   * Number of distinct thread ids minted so far
   */
  getThreadCount(): number {
    return this.threads.size;
  }

  /**
   * Lowercase, strip reply/forward/tag prefixes. Memoized per raw subject.
   */
  normalizeSubject(subject: string): string {
    if (!subject) {
      return '';
    }

    const cached = this.normalizedCache.get(subject);
    if (cached !== undefined) {
      return cached;
    }

    let normalized = subject.toLowerCase().replace(/\s+/g, ' ').trim();
    let previous: string;

    // one pass per pattern; repeated only so the result is stable
    do {
      previous = normalized;
      for (const pattern of SUBJECT_PREFIX_PATTERNS) {
        normalized = normalized.replace(pattern, '');
      }
      normalized = normalized.trim();
    } while (normalized !== previous);

    this.normalizedCache.set(subject, normalized);
    return normalized;
  }

  /**
   * Canonical id for a thread id previously returned by identifyThread
   */
  resolve(threadId: string): string {
    return this.parent.has(threadId) ? this.find(threadId) : threadId;
  }

  /**
   * Thread currently bound to a reference, if any
   */
  lookupReference(reference: string): string | null {
    const threadId = this.referenceMap.get(reference);
    return threadId ? this.find(threadId) : null;
  }

  /**
   * References bound to a thread, including those of threads united into it
   */
  getThreadMembers(threadId: string): string[] {
    const members = this.threads.get(this.resolve(threadId));
    return members ? Array.from(members) : [];
  }

  /**
   * Unions recorded since the last call
   */
  drainMerges(): ThreadMerge[] {
    const merges = this.pendingMerges;
    this.pendingMerges = [];
    return merges;
  }

  /**
   * Put back drained unions that did not reach storage, ahead of newer ones
   */
  requeueMerges(merges: ThreadMerge[]): void {
    this.pendingMerges = [...merges, ...this.pendingMerges];
  }

  private extractReferences(message: ThreadableMessage, messageId: string): string[] {
    const references = new Set<string>();

    for (const ref of message.references ?? []) {
      const trimmed = ref.trim();
      if (trimmed) {
        references.add(trimmed);
      }
    }

    if (message.content) {
      for (const match of message.content.match(MESSAGE_ID_PATTERN) ?? []) {
        references.add(match);
      }
    }

    references.delete(messageId);
    return Array.from(references);
  }

  private boundRoots(keys: string[]): string[] {
    const roots: string[] = [];
    for (const key of keys) {
      const threadId = this.referenceMap.get(key);
      if (threadId) {
        const root = this.find(threadId);
        if (!roots.includes(root)) {
          roots.push(root);
        }
      }
    }
    return roots;
  }

  private mint(kind: ThreadIdKind, messageId: string): string {
    const sequence = this.nextThreadId++;
    const threadId =
      kind === 'singleton'
        ? messageId.length > 8
          ? `singleton-${messageId.slice(-8)}`
          : `singleton-${sequence}`
        : `${kind}-${sequence}`;

    if (!this.threads.has(threadId)) {
      this.threads.set(threadId, new Set<string>());
      this.parent.set(threadId, threadId);
      this.mintOrder.set(threadId, sequence);
      logger.debug('Minted thread id', { threadId, messageId });
    }

    return this.find(threadId);
  }

  private bind(threadId: string, keys: string[]): void {
    const members = this.threads.get(threadId);
    for (const key of keys) {
      this.referenceMap.set(key, threadId);
      members?.add(key);
    }
  }

  /**
   * Unite roots under the earliest-minted one and return it
   */
  private unite(roots: string[]): string {
    if (roots.length === 1) {
      return roots[0];
    }

    const order = (id: string) => this.mintOrder.get(id) ?? Number.MAX_SAFE_INTEGER;
    const canonical = roots.reduce((best, id) => (order(id) < order(best) ? id : best));
    const canonicalMembers = this.threads.get(canonical);

    for (const root of roots) {
      if (root === canonical) continue;

      this.parent.set(root, canonical);
      for (const member of this.threads.get(root) ?? []) {
        canonicalMembers?.add(member);
      }
      this.pendingMerges.push({ from: root, into: canonical });
      logger.debug('United threads', { from: root, into: canonical });
    }

    return canonical;
  }

  private find(threadId: string): string {
    let root = threadId;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }

    // path compression
    let current = threadId;
    while (current !== root) {
      const up = this.parent.get(current);
      this.parent.set(current, root);
      if (up === undefined) break;
      current = up;
    }

    return root;
  }
}
