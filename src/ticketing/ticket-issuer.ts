import { v4 as uuidv4 } from 'uuid';

export const TICKET_PREFIX = 'TICKET_';
export const TICKET_ID_LENGTH = 8;

/**
 * Issue a fresh support ticket identifier, e.g. `TICKET_0K3Z9QAB`.
 *
 * The suffix is 8 uppercase base-36 characters taken from the first 48 random
 * bits of a v4 UUID. Nothing is stored; the caller persists it with the history record.
 */
export function issueTicketId(): string {
  const randomBits = parseInt(uuidv4().replace(/-/g, '').slice(0, 12), 16);
  const suffix = randomBits
    .toString(36)
    .toUpperCase()
    .padStart(TICKET_ID_LENGTH, '0')
    .slice(-TICKET_ID_LENGTH);
  return `${TICKET_PREFIX}${suffix}`;
}
