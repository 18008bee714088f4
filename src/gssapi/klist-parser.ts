/**
 * MIT `klist` output parser
 *
 * Reads the listing printed by `klist -c <cache>` under the C locale:
 *
 * ```
 * Ticket cache: FILE:/tmp/krb5cc_1000
 * Default principal: alice@EXAMPLE.COM
 *
 * Valid starting       Expires              Service principal
 * 10/19/26 09:00:00  10/19/26 19:00:00  krbtgt/EXAMPLE.COM@EXAMPLE.COM
 *         renew until 10/20/26 09:00:00
 * ```
 *
 * Timestamps are local time. Two- and four-digit years are accepted.
 *
 * @module gssapi/klist-parser
 */

export interface KlistTicket {
  validStarting: Date;
  expires: Date;
  servicePrincipal: string;
  renewUntil: Date | null;
}

export interface KlistListing {
  cacheName: string | null;
  defaultPrincipal: string | null;
  tickets: KlistTicket[];
}

const DATE = String.raw`(\d{2}/\d{2}/(?:\d{4}|\d{2}))\s+(\d{2}:\d{2}:\d{2})`;
const TICKET_LINE = new RegExp(`^${DATE}\\s+${DATE}\\s+(\\S+)\\s*$`);
const RENEW_LINE = new RegExp(`^\\s*renew until ${DATE}`);

/**
 * Convert a klist "MM/DD/YY" + "HH:MM:SS" pair into a local Date
 */
export function parseKlistTimestamp(date: string, time: string): Date {
  const [month, day, rawYear] = date.split('/').map((part) => Number.parseInt(part, 10));
  const [hours, minutes, seconds] = time.split(':').map((part) => Number.parseInt(part, 10));
  const year = rawYear < 100 ? 2000 + rawYear : rawYear;
  return new Date(year, month - 1, day, hours, minutes, seconds);
}

export function parseKlistOutput(output: string): KlistListing {
  const listing: KlistListing = {
    cacheName: null,
    defaultPrincipal: null,
    tickets: [],
  };

  for (const line of output.split(/\r?\n/)) {
    if (line.startsWith('Ticket cache:')) {
      listing.cacheName = line.slice('Ticket cache:'.length).trim();
      continue;
    }
    if (line.startsWith('Default principal:')) {
      listing.defaultPrincipal = line.slice('Default principal:'.length).trim();
      continue;
    }

    const ticket = TICKET_LINE.exec(line);
    if (ticket) {
      listing.tickets.push({
        validStarting: parseKlistTimestamp(ticket[1], ticket[2]),
        expires: parseKlistTimestamp(ticket[3], ticket[4]),
        servicePrincipal: ticket[5],
        renewUntil: null,
      });
      continue;
    }

    const renew = RENEW_LINE.exec(line);
    const last = listing.tickets[listing.tickets.length - 1];
    if (renew && last) {
      last.renewUntil = parseKlistTimestamp(renew[1], renew[2]);
    }
  }

  return listing;
}

/**
 * Find the ticket-granting ticket in a listing
 *
 * Prefers the TGT of the principal's own realm over cross-realm TGTs.
 */
export function findTicketGrantingTicket(
  listing: KlistListing,
  realm: string | null
): KlistTicket | undefined {
  const tgts = listing.tickets.filter((t) => t.servicePrincipal.startsWith('krbtgt/'));
  if (realm !== null) {
    const own = tgts.find((t) => t.servicePrincipal === `krbtgt/${realm}@${realm}`);
    if (own) {
      return own;
    }
  }
  return tgts[0];
}
