export { EventEnvelopeSchema, createEnvelope, type EventEnvelope } from './envelope';
export { NatsSubjects, resolveOutboxSubject, type AggregateType } from './subjects';
export * from './events';
export * from './api/pairing';
export * from './api/daily';
export * from './api/episode';
