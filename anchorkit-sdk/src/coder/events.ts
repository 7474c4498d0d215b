import { Idl } from '../idl';
import { AnyLayout, isRecord, structLayout } from './idl';
import { DISCRIMINATOR_SIZE, eventDiscriminator } from './discriminator';

export interface Event {
  name: string;
  data: Record<string, unknown>;
}

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Decodes events a program logs as base64: 8 byte discriminator followed by
 * the borsh encoded fields
 */
export class EventCoder {
  private readonly layouts = new Map<string, { name: string; layout: AnyLayout }>();

  constructor(idl: Idl) {
    const types = [...(idl.accounts ?? []), ...(idl.types ?? [])];
    for (const event of idl.events ?? []) {
      this.layouts.set(eventDiscriminator(event.name).toString('hex'), {
        name: event.name,
        layout: structLayout(event.fields, types, event.name),
      });
    }
  }

  /**
   * Null when the log is not one of this program's events
   */
  decode(log: string): Event | null {
    if (!BASE64.test(log)) return null;
    const data = Buffer.from(log, 'base64');
    if (data.length < DISCRIMINATOR_SIZE) return null;

    const entry = this.layouts.get(data.subarray(0, DISCRIMINATOR_SIZE).toString('hex'));
    if (!entry) return null;

    try {
      const decoded = entry.layout.decode(data.subarray(DISCRIMINATOR_SIZE));
      return isRecord(decoded) ? { name: entry.name, data: decoded } : null;
    } catch {
      return null;
    }
  }
}
