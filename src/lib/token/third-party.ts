/**
 * Third-party block exchange.
 *
 * The token holder sends a request carrying the signature of the token's last
 * block. The third party signs its block payload together with that signature,
 * so the resulting block can only be appended to that token.
 */

import { concatBytes, toBase64 } from '../encoding.js';
import { PublicKey, type PrivateKey } from '../keys.js';
import type { BlockBuilder } from './block.js';
import {
  FORMAT_VERSION,
  canonicalBytes,
  decodeField,
  parseBlockPayload,
  parseThirdPartyBlockWire,
  parseThirdPartyRequestWire,
  type ThirdPartyBlockWire,
  type ThirdPartyRequestWire,
} from './wire.js';

/**
 * Bytes covered by a third party's signature
 */
export function externalSignedMessage(payload: Uint8Array, previousSignature: Uint8Array): Uint8Array {
  return concatBytes(payload, previousSignature);
}

export class ThirdPartyRequest {
  constructor(readonly previousSignature: Uint8Array) {}

  static fromBytes(bytes: Uint8Array): ThirdPartyRequest {
    const wire = parseThirdPartyRequestWire(bytes);
    return new ThirdPartyRequest(decodeField(wire.previousSignature, 'previous signature'));
  }

  /**
   * Sign a block for the token this request was generated from
   */
  createBlock(privateKey: PrivateKey, builder: BlockBuilder): ThirdPartyBlock {
    const payload = builder.build();
    const signature = privateKey.sign(externalSignedMessage(payload, this.previousSignature));
    return new ThirdPartyBlock(payload, privateKey.publicKey(), signature);
  }

  serialize(): Uint8Array {
    const wire: ThirdPartyRequestWire = {
      version: FORMAT_VERSION,
      previousSignature: toBase64(this.previousSignature),
    };
    return canonicalBytes(wire);
  }
}

export class ThirdPartyBlock {
  constructor(
    readonly payload: Uint8Array,
    readonly externalKey: PublicKey,
    readonly externalSignature: Uint8Array
  ) {}

  static fromBytes(bytes: Uint8Array): ThirdPartyBlock {
    const wire = parseThirdPartyBlockWire(bytes);
    const payload = decodeField(wire.payload, 'third-party block payload');
    // reject undecodable payloads before they reach a token
    parseBlockPayload(payload);
    return new ThirdPartyBlock(
      payload,
      PublicKey.fromString(wire.external.publicKey),
      decodeField(wire.external.signature, 'external signature')
    );
  }

  /**
   * Whether this block was signed for a token whose last block carries
   * `previousSignature`
   */
  matches(previousSignature: Uint8Array): boolean {
    return this.externalKey.verify(externalSignedMessage(this.payload, previousSignature), this.externalSignature);
  }

  serialize(): Uint8Array {
    const wire: ThirdPartyBlockWire = {
      version: FORMAT_VERSION,
      payload: toBase64(this.payload),
      external: { publicKey: this.externalKey.toString(), signature: toBase64(this.externalSignature) },
    };
    return canonicalBytes(wire);
  }
}
