import type { CallSite } from '../types.ts';
import { formatSite } from '../site.ts';

export type SceneGraphErrorCode =
  | 'UNDECLARED_DESTINATION'
  | 'DUPLICATE_SCENE'
  | 'GRAPH_COMPILED'
  | 'NO_INITIAL_SCENE'
  | 'MISSING_EDGE';

/**
 * Thrown for graph declarations that cannot be navigated at all.
 * Runtime navigation problems are reported, never thrown.
 */
export class SceneGraphError extends Error {
  readonly code: SceneGraphErrorCode;
  readonly site: CallSite;

  constructor(code: SceneGraphErrorCode, message: string, site: CallSite) {
    super(`${message} (${formatSite(site)})`);
    this.name = 'SceneGraphError';
    this.code = code;
    this.site = site;
  }
}
