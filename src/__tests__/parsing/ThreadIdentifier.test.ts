/**
 * Unit Tests for ThreadIdentifier
 */

import { ThreadIdentifier } from '../../parsing/ThreadIdentifier';
import { ThreadableMessage } from '../../parsing/types';

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items];
  return items.flatMap((item, index) =>
    permutations([...items.slice(0, index), ...items.slice(index + 1)]).map((rest) => [item, ...rest])
  );
}

describe('ThreadIdentifier', () => {
  let identifier: ThreadIdentifier;

  beforeEach(() => {
    identifier = new ThreadIdentifier();
  });

  describe('identifyThread', () => {
    it('should return null without a message id', () => {
      expect(identifier.identifyThread(null)).toBeNull();
      expect(identifier.identifyThread(undefined)).toBeNull();
      expect(identifier.identifyThread({ message_id: '   ', subject: 'Hello' })).toBeNull();
      expect(identifier.getThreadCount()).toBe(0);
    });

    it('should thread a message with the one its body refers to', () => {
      const first = identifier.identifyThread({ message_id: '<a@x>', content: 'see <b@x>' });
      const second = identifier.identifyThread({ message_id: '<b@x>' });

      expect(first).toBe('thread-1');
      expect(second).toBe('thread-1');
      expect(identifier.getThreadCount()).toBe(1);
    });

    it('should use the explicit references field', () => {
      const reply = identifier.identifyThread({
        message_id: '<reply@example.com>',
        references: ['<original@example.com>'],
        subject: 'Re: Budget',
      });
      const original = identifier.identifyThread({
        message_id: '<original@example.com>',
        subject: 'Budget',
      });

      expect(reply).toBe('thread-1');
      expect(original).toBe('thread-1');
    });

    it('should ignore its own id when it appears in the content', () => {
      const threadId = identifier.identifyThread({
        message_id: '<self@example.com>',
        subject: 'Status',
        content: 'quoting <self@example.com> again',
      });

      expect(threadId).toBe('subject-1');
    });

    it('should group normalized subjects and keep distinct ones apart', () => {
      const base = identifier.identifyThread({ message_id: '<p1@example.com>', subject: 'Project Update' });
      const reply = identifier.identifyThread({ message_id: '<p2@example.com>', subject: 'Re: Project Update' });
      const other = identifier.identifyThread({ message_id: '<p3@example.com>', subject: 'Re: Project Updates' });

      expect(base).toBe('subject-1');
      expect(reply).toBe('subject-1');
      expect(other).toBe('subject-2');
      expect(identifier.getThreadCount()).toBe(2);
    });

    it('should mint a singleton from the last eight characters of a long id', () => {
      expect(identifier.identifyThread({ message_id: '<solo-message@example.com>' })).toBe(
        'singleton-ple.com>'
      );
    });

    it('should mint a numbered singleton for a short id', () => {
      identifier.identifyThread({ message_id: '<s@x>', subject: 'Something' });
      expect(identifier.identifyThread({ message_id: '<q@y>', subject: 'Re:' })).toBe('singleton-2');
    });

    it('should count a repeated singleton suffix once', () => {
      const first = identifier.identifyThread({ message_id: '<one@example.com>' });
      const second = identifier.identifyThread({ message_id: '<two@example.com>' });

      expect(first).toBe('singleton-ple.com>');
      expect(second).toBe(first);
      expect(identifier.getThreadCount()).toBe(1);
    });

    it('should keep a bound reference resolving to the same thread', () => {
      const first = identifier.identifyThread({ message_id: '<m1@example.com>', subject: 'Alpha' });
      const second = identifier.identifyThread({
        message_id: '<m2@example.com>',
        subject: 'Totally different',
        references: ['<m1@example.com>'],
      });

      expect(first).toBe('subject-1');
      expect(second).toBe('subject-1');
      expect(identifier.lookupReference('<m2@example.com>')).toBe('subject-1');
    });
  });

  describe('thread unions', () => {
    it('should unite two threads linked by one message under the earliest id', () => {
      const x = identifier.identifyThread({ message_id: '<x1@t>', references: ['<r1@t>'] });
      const y = identifier.identifyThread({ message_id: '<y1@t>', references: ['<r2@t>'] });
      const z = identifier.identifyThread({ message_id: '<z1@t>', references: ['<r1@t>', '<r2@t>'] });

      expect(x).toBe('thread-1');
      expect(y).toBe('thread-2');
      expect(z).toBe('thread-1');
      expect(identifier.resolve('thread-2')).toBe('thread-1');
      expect(identifier.lookupReference('<r2@t>')).toBe('thread-1');
      expect(identifier.drainMerges()).toEqual([{ from: 'thread-2', into: 'thread-1' }]);
      expect(identifier.drainMerges()).toEqual([]);
      expect(identifier.getThreadCount()).toBe(2);
    });

    it('should collect members of united threads', () => {
      identifier.identifyThread({ message_id: '<x1@t>', references: ['<r1@t>'] });
      identifier.identifyThread({ message_id: '<y1@t>', references: ['<r2@t>'] });
      identifier.identifyThread({ message_id: '<z1@t>', references: ['<r1@t>', '<r2@t>'] });

      expect(identifier.getThreadMembers('thread-2').sort()).toEqual(
        ['<r1@t>', '<r2@t>', '<x1@t>', '<y1@t>', '<z1@t>'].sort()
      );
    });

    it('should hand requeued unions back before newer ones', () => {
      identifier.identifyThread({ message_id: '<x1@t>', references: ['<r1@t>'] });
      identifier.identifyThread({ message_id: '<y1@t>', references: ['<r2@t>'] });
      identifier.identifyThread({ message_id: '<z1@t>', references: ['<r1@t>', '<r2@t>'] });
      const drained = identifier.drainMerges();

      identifier.identifyThread({ message_id: '<w1@t>', references: ['<r3@t>'] });
      identifier.identifyThread({ message_id: '<v1@t>', references: ['<r3@t>', '<r1@t>'] });
      identifier.requeueMerges(drained);

      expect(identifier.drainMerges()).toEqual([
        { from: 'thread-2', into: 'thread-1' },
        { from: 'thread-3', into: 'thread-1' },
      ]);
    });

    it('should give the same grouping in every arrival order', () => {
      const messages: ThreadableMessage[] = [
        { message_id: '<a@t>', references: ['<b@t>'] },
        { message_id: '<b@t>', references: ['<c@t>'] },
        { message_id: '<c@t>' },
      ];

      for (const order of permutations(messages)) {
        const local = new ThreadIdentifier();
        const assigned = order.map((message) => local.identifyThread(message));
        const resolved = new Set(
          assigned.map((threadId) => (threadId === null ? null : local.resolve(threadId)))
        );

        expect(resolved.size).toBe(1);
      }
    });

    it('should thread transitively through a chain of references', () => {
      const first = identifier.identifyThread({ message_id: '<c1@t>', subject: 'Kickoff' });
      identifier.identifyThread({ message_id: '<c2@t>', references: ['<c1@t>'] });
      const last = identifier.identifyThread({ message_id: '<c3@t>', references: ['<c2@t>'] });

      expect(last).toBe(first);
    });
  });

  describe('getThreadCount', () => {
    it('should never decrease', () => {
      const messages: ThreadableMessage[] = [
        { message_id: '<n1@t>', subject: 'One' },
        { message_id: '<n2@t>', references: ['<n9@t>'] },
        { message_id: '<n3@t>', references: ['<n1@t>', '<n9@t>'] },
        { message_id: '<n4@t>', subject: 'Re: One' },
        { message_id: '<n5@t>' },
      ];

      let previous = identifier.getThreadCount();
      for (const message of messages) {
        identifier.identifyThread(message);
        const current = identifier.getThreadCount();
        expect(current).toBeGreaterThanOrEqual(previous);
        previous = current;
      }
      expect(previous).toBe(3);
    });
  });

  describe('normalizeSubject', () => {
    it('should strip reply, forward and tag prefixes', () => {
      expect(identifier.normalizeSubject('Re: Fwd: [ext] Hello   World')).toBe('hello world');
      expect(identifier.normalizeSubject('FW: Reply: Quarterly numbers')).toBe('quarterly numbers');
    });

    it('should strip repeated prefixes', () => {
      expect(identifier.normalizeSubject('RE: RE: test')).toBe('test');
    });

    it('should leave non-word tags and inner prefixes alone', () => {
      expect(identifier.normalizeSubject('[a-b] notes')).toBe('[a-b] notes');
      expect(identifier.normalizeSubject('Notes re: budget')).toBe('notes re: budget');
    });

    it('should return an empty string for empty input', () => {
      expect(identifier.normalizeSubject('')).toBe('');
      expect(identifier.normalizeSubject('Re: ')).toBe('');
    });

    it('should be idempotent', () => {
      const subjects = [
        'Re: Fwd: [ext] Hello',
        'RE: re: RE: loop',
        '[list] Re: [other] Fw: x',
        '  Spaced   out  ',
        'reply:fwd:fw:done',
      ];

      for (const subject of subjects) {
        const once = identifier.normalizeSubject(subject);
        expect(identifier.normalizeSubject(once)).toBe(once);
      }
    });
  });
});
