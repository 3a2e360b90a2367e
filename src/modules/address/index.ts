export { TronAddress, canonicalize, formatAddress } from './address.js';
export type { AddressEncoding } from './address.js';
