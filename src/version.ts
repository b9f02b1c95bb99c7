/**
 * Current pagecite release, printed by `pagecite --version`.
 */
export const PAGECITE_VERSION = '0.1.0';
