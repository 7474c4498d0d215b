import { PublicKey } from '@solana/web3.js';

import { Coder } from '../coder';
import { Event } from '../coder/events';

const PROGRAM_LOG = 'Program log: ';
const PROGRAM_DATA = 'Program data: ';
const INVOKE = /^Program ([1-9A-HJ-NP-Za-km-z]{32,44}) invoke \[\d+\]$/;
const EXIT = /^Program ([1-9A-HJ-NP-Za-km-z]{32,44}) (success|failed)/;

/**
 * Pulls a program's events out of transaction logs. Tracks the invocation
 * stack so that logs of programs it calls (or that call it) are ignored.
 */
export class EventParser {
  private readonly programId: string;

  constructor(programId: PublicKey, private readonly coder: Coder) {
    this.programId = programId.toBase58();
  }

  parseLogs(logs: string[]): Event[] {
    const stack: string[] = [];
    const events: Event[] = [];

    for (const line of logs) {
      const invoke = INVOKE.exec(line);
      if (invoke) {
        stack.push(invoke[1]);
        continue;
      }
      if (EXIT.test(line)) {
        stack.pop();
        continue;
      }
      if (stack[stack.length - 1] !== this.programId) continue;

      let payload: string | null = null;
      if (line.startsWith(PROGRAM_DATA)) {
        payload = line.slice(PROGRAM_DATA.length);
      } else if (line.startsWith(PROGRAM_LOG)) {
        payload = line.slice(PROGRAM_LOG.length);
      }
      if (payload === null) continue;

      const event = this.coder.events.decode(payload);
      if (event) events.push(event);
    }

    return events;
  }
}
