/**
 * Boundary between the sync engine and whatever talks to the remote service.
 */

import type { FileRecord } from '../manifest/types.js';

/**
 * Authenticated session, passed explicitly into every catalog call.
 */
export interface CatalogSession {
  /** Bearer token for the remote service */
  accessToken: string;
}

/** One line of the owned-items enumeration. */
export interface CatalogEntry {
  id: string;

  /** The service flagged this item as changed since the user last looked */
  updated: boolean;
}

/** Full detail record for one item, as reported by the service. */
export interface ItemRecord {
  id: string;
  title: string;
  notes: string;
  serial?: string;
  files: FileRecord[];
}

export interface CatalogClient {
  /**
   * Every item identifier owned by the session's user, in catalog order.
   *
   * @throws AuthExpiredError | TransientNetworkError
   */
  enumerate(session: CatalogSession): Promise<CatalogEntry[]>;

  /**
   * Detail record for one item.
   *
   * @throws AuthExpiredError | TransientNetworkError | UnknownItemError | CatalogFormatError
   */
  fetchDetail(session: CatalogSession, id: string): Promise<ItemRecord>;
}
