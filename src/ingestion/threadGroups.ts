/**
 * Batch-level thread grouping
 */

import { ThreadIdentifier } from '../parsing/ThreadIdentifier';
import { NormalizedMessage, ThreadedMessage, ThreadSummary } from '../parsing/types';

export interface ThreadGrouping {
  /** Canonical thread id -> messages, in order of first appearance */
  groups: Map<string, ThreadedMessage[]>;
  /** Messages the identifier could not thread (no message id) */
  unthreaded: ThreadedMessage[];
}

/**
 * Identify every message of a batch, then group by canonical thread id.
 * Resolution happens after the whole batch is identified, since a later
 * message can unite threads assigned earlier in the same batch.
 */
export function groupByThread(
  batch: NormalizedMessage[],
  identifier: ThreadIdentifier
): ThreadGrouping {
  const assigned = batch.map((message) => ({
    message,
    threadId: identifier.identifyThread(message),
  }));

  const groups = new Map<string, ThreadedMessage[]>();
  const unthreaded: ThreadedMessage[] = [];

  for (const { message, threadId } of assigned) {
    if (threadId === null) {
      unthreaded.push({ ...message, thread_id: null });
      continue;
    }

    const canonical = identifier.resolve(threadId);
    const group = groups.get(canonical);
    const threaded: ThreadedMessage = { ...message, thread_id: canonical };
    if (group) {
      group.push(threaded);
    } else {
      groups.set(canonical, [threaded]);
    }
  }

  return { groups, unthreaded };
}

export function summarizeThread(threadId: string, messages: NormalizedMessage[]): ThreadSummary {
  const participants = new Set<string>();
  let subject = '';
  let startDate: string | null = null;
  let lastUpdate: string | null = null;

  for (const message of messages) {
    if (!subject && message.subject) {
      subject = message.subject;
    }
    if (message.sender) participants.add(message.sender);
    if (message.receiver) participants.add(message.receiver);

    if (message.date) {
      if (startDate === null || message.date < startDate) startDate = message.date;
      if (lastUpdate === null || message.date > lastUpdate) lastUpdate = message.date;
    }
  }

  return {
    thread_id: threadId,
    subject,
    participants: Array.from(participants).sort(),
    start_date: startDate,
    last_update: lastUpdate,
    message_count: messages.length,
  };
}
