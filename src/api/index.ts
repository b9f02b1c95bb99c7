/**
 * @fileoverview API Module Exports
 */

export {
  Pagecite,
  createPagecite,
  openLocalPagecite,
  type LocalPagecite,
  type PageciteConfig,
} from './pagecite.js';
