/**
 * Request Authenticator - FoxESS open API request signing
 *
 * Each request carries the raw token, a millisecond timestamp and
 *
 *   signature = md5(path + "\r\n" + token + "\r\n" + timestamp)
 *
 * where `path` is the endpoint path (e.g. `/op/v0/device/list`), not the full
 * URL. The construction and digest are fixed by the upstream API.
 *
 * @module services/request-auth
 */

import { createHash } from 'node:crypto';
import { DEFAULT_LANG, DEVICE_SN_PATTERN, TOKEN_PATTERN, USER_AGENT } from '../config/foxess';
import type { Credential } from '../types/foxess';
import { ConfigurationError } from '../utils/errors';

export type AuthHeaders = Record<
  'Content-Type' | 'token' | 'timestamp' | 'signature' | 'lang' | 'User-Agent',
  string
>;

export function isValidToken(token: string): boolean {
  return TOKEN_PATTERN.test(token);
}

export function isValidDeviceSerial(serial: string): boolean {
  return DEVICE_SN_PATTERN.test(serial);
}

/**
 * Validate a credential pair
 *
 * @throws ConfigurationError naming the offending field
 */
export function validateCredential(apiToken: string, deviceSerial: string): Credential {
  if (!isValidToken(apiToken)) {
    throw new ConfigurationError(
      'Invalid FoxESS API token format. Must be UUID format: xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx',
      { field: 'apiToken' }
    );
  }

  if (!isValidDeviceSerial(deviceSerial)) {
    throw new ConfigurationError(
      'Invalid device serial number format. Must be 10-20 uppercase alphanumeric characters.',
      { field: 'deviceSerial' }
    );
  }

  return Object.freeze({ apiToken, deviceSerial });
}

export class RequestAuthenticator {
  private readonly credential: Credential;

  constructor(
    apiToken: string,
    deviceSerial: string,
    private readonly now: () => number = () => Date.now()
  ) {
    this.credential = validateCredential(apiToken, deviceSerial);
  }

  get deviceSerial(): string {
    return this.credential.deviceSerial;
  }

  /**
   * Hex MD5 signature for a path at a given millisecond timestamp
   */
  signature(path: string, timestampMillis: number): string {
    const input = `${path}\r\n${this.credential.apiToken}\r\n${timestampMillis}`;
    return createHash('md5').update(input, 'utf8').digest('hex');
  }

  /**
   * Fresh headers for one outbound request. Never reuse the result.
   */
  headers(path: string, languageCode: string = DEFAULT_LANG): AuthHeaders {
    const timestamp = Math.floor(this.now());

    return {
      'Content-Type': 'application/json',
      token: this.credential.apiToken,
      timestamp: String(timestamp),
      signature: this.signature(path, timestamp),
      lang: languageCode,
      'User-Agent': USER_AGENT,
    };
  }

  verifySignature(path: string, timestampMillis: number, signature: string): boolean {
    return this.signature(path, timestampMillis) === signature.toLowerCase();
  }

  /**
   * Replace the token in `text` with a masked form safe for logs
   */
  maskToken(text: string): string {
    const token = this.credential.apiToken;
    if (!text.includes(token)) return text;
    return text.split(token).join(`${token.slice(0, 8)}****${token.slice(-4)}`);
  }
}
