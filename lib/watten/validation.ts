import { z } from 'zod';

import { eventEnvelopeSchema, eventPayloadSchemas } from '@/schema/events';
import type { KnownWattenEvent, WattenEventType } from './events';

export type ValidationFailure = {
  code: 'event.invalid_shape' | 'event.unknown_type' | 'event.invalid_payload';
  details?: unknown;
};

export type InvalidEventError = Error & { info: ValidationFailure };

const invalidEvent = (info: ValidationFailure): InvalidEventError =>
  Object.assign(new Error('InvalidEvent'), { name: 'InvalidEvent', info });

const isKnownType = (type: string): type is WattenEventType => type in eventPayloadSchemas;

export function validateEventStrict(e: unknown): KnownWattenEvent {
  const base = eventEnvelopeSchema.safeParse(e);
  if (!base.success) {
    throw invalidEvent({ code: 'event.invalid_shape', details: base.error.flatten() });
  }
  const t = base.data.type;
  if (!isKnownType(t)) {
    throw invalidEvent({ code: 'event.unknown_type', details: { type: t } });
  }
  const schema: z.ZodType<unknown> = eventPayloadSchemas[t];
  const payload = schema.safeParse(base.data.payload);
  if (!payload.success) {
    throw invalidEvent({ code: 'event.invalid_payload', details: payload.error.flatten() });
  }
  return { ...base.data, type: t, payload: payload.data } as KnownWattenEvent;
}
