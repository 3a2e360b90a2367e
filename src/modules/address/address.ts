import { createHash } from 'node:crypto';
import bs58 from 'bs58';
import { DecodeError } from '../../infra/errors.js';
import { err, ok, type Result } from '../../utils/result.js';

export type AddressEncoding = 'hex' | 'base58';

const VERSION_BYTE = 0x41;
const PAYLOAD_BYTES = 21;
const CHECKSUM_BYTES = 4;
const HEX_RE = /^[0-9a-fA-F]*$/;
const BASE58_RE = /^[1-9A-HJ-NP-Za-km-z]+$/;

function checksum(payload: Uint8Array): Buffer {
  const once = createHash('sha256').update(payload).digest();
  return createHash('sha256').update(once).digest().subarray(0, CHECKSUM_BYTES);
}

/**
 * A TRON account address held as its 21-byte payload (version byte 0x41 plus
 * the 20-byte account id). The canonical key is the lowercase hex of that
 * payload, e.g. `41a614f803b6fd780986a42c78ec9c7f77e6ded13c`.
 */
export class TronAddress {
  private readonly payload: Buffer;

  private constructor(payload: Buffer) {
    this.payload = payload;
  }

  static fromPayload(payload: Buffer): Result<TronAddress, DecodeError> {
    const hex = payload.toString('hex');
    if (payload.length !== PAYLOAD_BYTES) {
      return err(new DecodeError(hex, `expected ${PAYLOAD_BYTES} bytes, got ${payload.length}`));
    }
    if (payload[0] !== VERSION_BYTE) {
      return err(new DecodeError(hex, 'version byte is not 0x41'));
    }
    return ok(new TronAddress(Buffer.from(payload)));
  }

  get hex(): string {
    return this.payload.toString('hex');
  }

  toBase58(): string {
    return bs58.encode(Buffer.concat([this.payload, checksum(this.payload)]));
  }

  format(encoding: AddressEncoding): string {
    return encoding === 'base58' ? this.toBase58() : this.hex;
  }

  equals(other: TronAddress): boolean {
    return this.payload.equals(other.payload);
  }

  toString(): string {
    return this.hex;
  }
}

function decodeHex(input: string, digits: string): Result<TronAddress, DecodeError> {
  if (!HEX_RE.test(digits)) {
    return err(new DecodeError(input, 'invalid hex characters'));
  }
  if (digits.length === 40) {
    // EVM-style account id as reported inside event results
    return TronAddress.fromPayload(Buffer.from(`41${digits}`, 'hex'));
  }
  if (digits.length === 42) {
    const decoded = TronAddress.fromPayload(Buffer.from(digits, 'hex'));
    return decoded.ok ? decoded : err(new DecodeError(input, decoded.error.message));
  }
  return err(new DecodeError(input, `expected 40 or 42 hex digits, got ${digits.length}`));
}

function decodeBase58(input: string, value: string): Result<TronAddress, DecodeError> {
  if (!BASE58_RE.test(value)) {
    return err(new DecodeError(input, 'invalid base58 characters'));
  }
  const full = Buffer.from(bs58.decode(value));
  if (full.length !== PAYLOAD_BYTES + CHECKSUM_BYTES) {
    return err(new DecodeError(input, `decoded length ${full.length} is not ${PAYLOAD_BYTES + CHECKSUM_BYTES}`));
  }
  const payload = full.subarray(0, PAYLOAD_BYTES);
  if (!checksum(payload).equals(full.subarray(PAYLOAD_BYTES))) {
    return err(new DecodeError(input, 'invalid base58 checksum'));
  }
  const decoded = TronAddress.fromPayload(payload);
  return decoded.ok ? decoded : err(new DecodeError(input, decoded.error.message));
}

/**
 * Accepts base58check (`T...`), 21-byte hex with the `41` prefix, or 20-byte
 * hex, each optionally `0x`-prefixed where hex.
 */
export function canonicalize(input: string): Result<TronAddress, DecodeError> {
  const value = input.trim();
  if (value.length === 0) {
    return err(new DecodeError(input, 'empty address'));
  }

  if (value.startsWith('0x') || value.startsWith('0X')) {
    return decodeHex(input, value.slice(2));
  }
  if (HEX_RE.test(value) && (value.length === 40 || value.length === 42)) {
    return decodeHex(input, value);
  }
  return decodeBase58(input, value);
}

/** Canonicalizes and renders in the requested encoding. */
export function formatAddress(
  input: string,
  encoding: AddressEncoding,
): Result<string, DecodeError> {
  const parsed = canonicalize(input);
  return parsed.ok ? ok(parsed.value.format(encoding)) : parsed;
}
