import type { PayloadCipher } from './types';

/**
 * Leaves payloads as they are. Suits gateways in front of the app API that
 * terminate its envelope cipher; a real cipher is passed in at wiring instead.
 */
export const passthroughCipher: PayloadCipher = {
  encrypt: (plain) => plain,
  decrypt: (data) => data,
};
