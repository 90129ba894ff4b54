import { describe, it, expect } from 'vitest';
import { Session } from './session';
import { InvalidStateError } from '../../shared/errors';
import { computeSessionMetrics } from '../analytics/engine';
import { interaction } from '../../test-utils/fakes';

const START = new Date('2024-03-01T10:00:00.000Z');
const END = new Date('2024-03-01T10:20:00.000Z');

function closeSession(session: Session): void {
  const metrics = computeSessionMetrics({
    interactions: session.interactions,
    conditionClassifications: session.conditionClassifications,
    startTime: session.startTime,
    endTime: END,
  });
  session.close(END, 'summary', metrics);
}

describe('Session', () => {
  it('keeps interactions in append order', () => {
    const session = Session.start('s-1', 'p-1', START);

    session.append(interaction('sadness', { userMessage: 'first' }));
    session.append(interaction('joy', { userMessage: 'second' }));
    session.append(interaction(null, { userMessage: 'third' }));

    expect(session.interactions.map((i) => i.userMessage)).toEqual(['first', 'second', 'third']);
    expect(session.length).toBe(3);
    expect(session.isOpen).toBe(true);
  });

  it('freezes appended interactions', () => {
    const session = Session.start('s-1', 'p-1', START);
    session.append(interaction('calm'));

    expect(Object.isFrozen(session.interactions[0])).toBe(true);
  });

  it('rejects appends after close and leaves the ledger unchanged', () => {
    const session = Session.start('s-1', 'p-1', START);
    session.append(interaction('calm'));
    closeSession(session);

    expect(() => session.append(interaction('joy'))).toThrow(InvalidStateError);
    expect(session.length).toBe(1);
  });

  it('rejects a second close', () => {
    const session = Session.start('s-1', 'p-1', START);
    closeSession(session);

    expect(() => closeSession(session)).toThrow(InvalidStateError);
    expect(session.endTime).toEqual(END);
  });

  it('restores from its snapshot', () => {
    const session = Session.start('s-1', 'p-1', START);
    session.append(interaction('fear', { techniqueUsed: 'letting_go', metadata: { intensity: 'high' } }));
    session.addClassification('anxiety');
    closeSession(session);

    const restored = Session.fromDocument(JSON.parse(JSON.stringify(session.toSnapshot())));

    expect(restored.ok).toBe(true);
    if (!restored.ok) return;
    expect(restored.value.toSnapshot()).toEqual(session.toSnapshot());
    expect(restored.value.isOpen).toBe(false);
    expect(restored.value.summary).toBe('summary');
  });

  it('reports invalid documents as a parse error', () => {
    const result = Session.fromDocument({ sessionId: 's-1' });

    expect(result.ok).toBe(false);
  });
});
