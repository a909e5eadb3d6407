import { describe, it, expect, beforeEach } from 'vitest';
import { ConversationMachine } from '../machine.js';
import { SlotRegistry } from '../../extraction/registry.js';
import { InvalidStateError } from '../../errors.js';
import type { ConversationSession } from '../types.js';

const AGREEMENT = 'Agreement between [NAME] and [NAME2], dated ____.';
const NAME_PROMPT = 'Please provide the full name for "NAME".';
const DATE_PROMPT =
  'Please provide the date for the blank below (for example, March 1, 2024).\n' +
  '> between [NAME] and [NAME2], dated ____.';

const fixedClock = () => new Date('2024-05-01T12:00:00.000Z');

let machine: ConversationMachine;
let registry: SlotRegistry;
let session: ConversationSession;

beforeEach(() => {
  machine = new ConversationMachine({ now: fixedClock });
  registry = SlotRegistry.build(AGREEMENT);
  session = machine.newSession('doc_1', 'sess_1');
});

/** Answer the two name slots so the date slot is current */
function answerNames(): void {
  machine.start(session, registry);
  machine.receive(session, registry, 'Jane Doe');
  machine.receive(session, registry, 'John Roe');
}

/* ============= start ============= */

describe('start', () => {
  it('prompts for the first pending slot', () => {
    const turn = machine.start(session, registry);

    expect(turn.outcome).toBe('prompted');
    expect(turn.state).toBe('awaiting_input');
    expect(turn.cursorSlot?.id).toBe(0);
    expect(session.cursor).toBe(0);
    expect(session.history).toEqual([
      { role: 'assistant', text: NAME_PROMPT, timestamp: '2024-05-01T12:00:00.000Z', relatedSlotId: 0 },
    ]);
  });

  it('is only valid while idle', () => {
    machine.start(session, registry);
    expect(() => machine.start(session, registry)).toThrow(InvalidStateError);
  });

  it('completes immediately when there is nothing to fill', () => {
    const empty = SlotRegistry.build('No placeholders here.');
    const turn = machine.start(session, empty);

    expect(turn.outcome).toBe('complete');
    expect(session.state).toBe('complete');
    expect(turn.progress).toBe(1);
    expect(turn.messages.map((m) => m.text)).toEqual([
      'This document has no placeholders to fill. It is ready to download.',
    ]);
  });
});

/* ============= receive ============= */

describe('receive', () => {
  it('accepts a valid value and prompts for the next slot', () => {
    machine.start(session, registry);
    const turn = machine.receive(session, registry, '  Jane   Doe ');

    expect(turn.outcome).toBe('accepted');
    expect(registry.get(0)).toMatchObject({ value: 'Jane Doe', status: 'filled' });
    expect(session.cursor).toBe(1);
    expect(session.history).toHaveLength(4);
    expect(turn.messages.map((m) => [m.role, m.text])).toEqual([
      ['user', '  Jane   Doe '],
      ['assistant', 'Thanks. "NAME" is set to Jane Doe.'],
      ['assistant', 'Please provide the full name for "NAME2".'],
    ]);
  });

  it('rejects an unparsable date and restates the prompt', () => {
    answerNames();
    const before = session.history.length;

    const turn = machine.receive(session, registry, 'not a date');

    expect(turn.outcome).toBe('rejected');
    expect(turn.rejection).toBe('unparsable date');
    expect(session.state).toBe('awaiting_input');
    expect(session.cursor).toBe(2);
    expect(registry.get(2).status).toBe('pending');
    expect(session.history).toHaveLength(before + 2);
    expect(session.history[session.history.length - 1].text).toBe(
      `Sorry, that didn't work: unparsable date.\n${DATE_PROMPT}`
    );
  });

  it('accepts a date, normalizes it and completes', () => {
    answerNames();
    const turn = machine.receive(session, registry, 'March 1, 2024');

    expect(turn.outcome).toBe('accepted');
    expect(registry.get(2)).toMatchObject({ value: '2024-03-01', status: 'filled' });
    expect(turn.state).toBe('complete');
    expect(session.cursor).toBeNull();
    expect(turn.cursorSlot).toBeNull();
    expect(turn.progress).toBe(1);
    expect(turn.messages[turn.messages.length - 1].text).toBe(
      'All done! Every placeholder has been handled and your document is ready to download.'
    );
  });

  it('allows unlimited retries', () => {
    answerNames();
    for (let i = 0; i < 5; i++) {
      expect(machine.receive(session, registry, 'soon').outcome).toBe('rejected');
    }
    expect(machine.receive(session, registry, '2024-03-01').outcome).toBe('accepted');
  });

  it('is invalid outside awaiting_input', () => {
    expect(() => machine.receive(session, registry, 'Jane')).toThrow('Cannot receive while session is idle');

    answerNames();
    machine.receive(session, registry, 'March 1, 2024');
    expect(() => machine.receive(session, registry, 'again')).toThrow(
      'Cannot receive while session is complete'
    );
  });

  it('fills aliases with the same answer', () => {
    const aliased = SlotRegistry.build('[Name] agrees. Signed: [Name]');
    machine.start(session, aliased);
    const turn = machine.receive(session, aliased, 'Jane Doe');

    expect(aliased.list().map((s) => s.value)).toEqual(['Jane Doe', 'Jane Doe']);
    expect(turn.state).toBe('complete');
  });
});

/* ============= skip ============= */

describe('skip', () => {
  it('completes when the last pending slot is skipped', () => {
    answerNames();
    const turn = machine.skip(session, registry);

    expect(turn.outcome).toBe('skipped');
    expect(registry.get(2)).toMatchObject({ value: null, status: 'skipped' });
    expect(session.state).toBe('complete');
    expect(turn.progress).toBe(1);
  });

  it('advances to the next slot', () => {
    machine.start(session, registry);
    const turn = machine.skip(session, registry);

    expect(turn.cursorSlot?.id).toBe(1);
    expect(turn.messages.map((m) => m.text)).toEqual([
      'Skipped "NAME"; it will stay as it is in the document.',
      'Please provide the full name for "NAME2".',
    ]);
  });

  it('is invalid outside awaiting_input', () => {
    expect(() => machine.skip(session, registry)).toThrow(InvalidStateError);
  });

  it('warns that skipped slots block the download when they are not allowed', () => {
    const strict = new ConversationMachine({ now: fixedClock, allowSkipped: false });
    const doc = SlotRegistry.build('Signed by [NAME].');
    const s = strict.newSession('doc_2', 'sess_2');
    strict.start(s, doc);
    const turn = strict.skip(s, doc);

    expect(turn.messages.map((m) => m.text)).toEqual([
      'Skipped "NAME"; the document cannot be downloaded while it is left blank.',
      'All done, but 1 skipped placeholder(s) must be filled before the document can be downloaded.',
    ]);
  });
});

/* ============= resync ============= */

describe('resync', () => {
  it('leaves a session alone while its cursor slot is pending', () => {
    machine.start(session, registry);

    expect(machine.resync(session, registry)).toBeNull();
    expect(session.cursor).toBe(0);
  });

  it('moves past a slot resolved elsewhere', () => {
    machine.start(session, registry);
    registry.update(0, 'Jane Doe');

    const turn = machine.resync(session, registry);
    expect(turn?.outcome).toBe('prompted');
    expect(turn?.cursorSlot?.id).toBe(1);
    expect(turn?.messages.map((m) => m.text)).toEqual([
      '"NAME" was already answered in another session.',
      'Please provide the full name for "NAME2".',
    ]);
  });

  it('completes when nothing is left', () => {
    machine.start(session, registry);
    registry.update(0, 'Jane Doe');
    registry.update(1, 'John Roe');
    registry.update(2, '2024-03-01');

    const turn = machine.resync(session, registry);
    expect(turn?.state).toBe('complete');
    expect(machine.progress(session, registry)).toBe(1);
  });
});

/* ============= progress ============= */

describe('progress', () => {
  it('never decreases and reaches 1 only when complete', () => {
    const seen: number[] = [machine.progress(session, registry)];
    const record = () => seen.push(machine.progress(session, registry));

    machine.start(session, registry);
    record();
    machine.receive(session, registry, '12345');
    record();
    machine.receive(session, registry, 'Jane Doe');
    record();
    machine.skip(session, registry);
    record();
    machine.receive(session, registry, 'not a date');
    record();
    expect(seen.every((p) => p < 1)).toBe(true);

    machine.receive(session, registry, '03/01/2024');
    record();

    for (let i = 1; i < seen.length; i++) {
      expect(seen[i]).toBeGreaterThanOrEqual(seen[i - 1]);
    }
    expect(seen[seen.length - 1]).toBe(1);
    expect(session.state).toBe('complete');
  });

  it('reports 0 for an empty document until its session completes', () => {
    const empty = SlotRegistry.build('');
    expect(machine.progress(session, empty)).toBe(0);

    machine.start(session, empty);
    expect(machine.progress(session, empty)).toBe(1);
  });
});
