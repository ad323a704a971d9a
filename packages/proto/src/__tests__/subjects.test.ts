import { describe, it, expect } from 'vitest';
import { resolveOutboxSubject, NatsSubjects } from '../subjects';

describe('resolveOutboxSubject', () => {
  it('routes notify events to the episode subject', () => {
    const subject = resolveOutboxSubject('episode', 'ep-1', 'CARE_NOTIFY');
    expect(subject).toBe(NatsSubjects.episodeNotify('ep-1'));
    expect(subject).toBe('care.notify.ep-1');
  });

  it('routes audit events by resource type', () => {
    expect(resolveOutboxSubject('audit', 'pairing:p-1', 'CARE_AUDIT')).toBe('care.audit.pairing');
    expect(resolveOutboxSubject('audit', 'daily_status:d-1', 'CARE_AUDIT')).toBe('care.audit.daily_status');
  });

  it('uses the whole reference when it has no type prefix', () => {
    expect(resolveOutboxSubject('audit', 'system', 'CARE_AUDIT')).toBe('care.audit.system');
  });

  it('falls back to a generic subject for unknown aggregates', () => {
    expect(resolveOutboxSubject('report', 'r-1', 'UNKNOWN_EVENT')).toBe('report.r-1.UNKNOWN_EVENT');
  });
});

describe('NatsSubjects', () => {
  it('provides wildcards for consumers', () => {
    expect(NatsSubjects.allNotify).toBe('care.notify.>');
    expect(NatsSubjects.allAudit).toBe('care.audit.>');
  });
});
