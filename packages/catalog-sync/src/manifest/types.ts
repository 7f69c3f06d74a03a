/**
 * Manifest types.
 *
 * The manifest is the local catalog of everything the user owns on the
 * remote service. It is only ever written by the sync engine; the
 * downloader and the verifier read it.
 */

export type FileKind = 'installer' | 'extra' | 'patch' | 'language-pack';

export const FILE_KINDS: readonly FileKind[] = ['installer', 'extra', 'patch', 'language-pack'];

/** Kinds the CLI calls "game files" (everything except extras). */
export const GAME_KINDS: readonly FileKind[] = ['installer', 'patch', 'language-pack'];

/** Tag value that matches every OS or language filter. */
export const ANY_TAG = 'any';

/** One downloadable artifact belonging to an item. */
export interface FileRecord {
  /** File name as published by the service; unique within its item */
  filename: string;

  /** Source URL */
  url: string;

  /** Declared size in bytes */
  size: number;

  /** Declared content hash (lower-case hex), null when the service has none */
  checksum: string | null;

  kind: FileKind;

  /** Operating-system tag (windows, mac, linux, or "any") */
  os: string;

  /** Language tag (en, fr, ..., or "any") */
  lang: string;

  /** Set by the service when this file changed since it was last seen */
  updated: boolean;
}

/** One catalog-level product. */
export interface Item {
  /** Stable identifier (slug) */
  id: string;

  title: string;

  /** Free-text notes; empty string when there are none */
  notes: string;

  /** Serial / activation code, when the product has one */
  serial?: string;

  /** ISO timestamp of the sync run that last wrote this item */
  syncedAt: string;

  /** Files in the order the service listed them */
  files: FileRecord[];
}

export interface Manifest {
  version: 1;

  /** Items keyed by id, in insertion order */
  items: Map<string, Item>;
}

/** Selection filter for manifest queries. Empty arrays mean "no constraint". */
export interface ManifestFilter {
  os?: readonly string[];
  lang?: readonly string[];
  kinds?: readonly FileKind[];
  itemId?: string;
}

export interface ManifestMatch {
  item: Item;
  file: FileRecord;
}
