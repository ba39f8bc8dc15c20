/**
 * @fileoverview Barrel export for data modules.
 *
 * The vendor catalog is loaded from vendors/vendor-catalog.json, so adding a
 * vendor means adding a rule row there, never touching classification code.
 */

// Types
export type {
  VendorMatchKind,
  VendorRuleRaw,
  VendorCatalogRaw,
  UrlSubstringRule,
  UrlRegexRule,
  InlineFingerprintRule,
  UrlRule,
  VendorRule,
  VendorCatalog,
} from './types.js'

export { UNKNOWN_VENDOR } from './types.js'

// Data loaders
export {
  compileVendorCatalog,
  loadVendorCatalog,
  getVendorCatalog,
} from './loader.js'
