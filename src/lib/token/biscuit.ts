/**
 * Signed, append-only chains of Datalog blocks.
 *
 * Block `i` is signed by the ephemeral key announced in block `i - 1` (the root
 * key for the authority block) over `payload ‖ nextKey ‖ externalSignature?`.
 * An attenuable token carries the last ephemeral private key as its proof; a
 * sealed token replaces it with a final signature, after which nothing can be
 * appended.
 */

import type { BlockCode } from '../datalog/ast.js';
import { parseBlock } from '../datalog/parser.js';
import { bytesToHex, concatBytes, textEncoder, toBase64, fromBase64 } from '../encoding.js';
import { TokenError, errorMessage } from '../errors.js';
import { PrivateKey, PublicKey } from '../keys.js';
import { AuthorityBuilder, type Block, type BlockBuilder } from './block.js';
import { ThirdPartyBlock, ThirdPartyRequest, externalSignedMessage } from './third-party.js';
import {
  FORMAT_VERSION,
  canonicalBytes,
  decodeField,
  parseBlockPayload,
  parseTokenWire,
  type SignedBlockWire,
  type TokenWire,
} from './wire.js';

interface ExternalSignature {
  publicKey: PublicKey;
  signature: Uint8Array;
}

/**
 * A block as it sits in the chain: its signed bytes and the decoded view
 */
interface ChainLink {
  payload: Uint8Array;
  nextKeyText: string;
  nextKey: PublicKey;
  signature: Uint8Array;
  external?: ExternalSignature;
  block: Block;
}

type Proof = { type: 'next'; secret: PrivateKey } | { type: 'final'; signature: Uint8Array };

function signedMessage(payload: Uint8Array, nextKey: string, external?: ExternalSignature): Uint8Array {
  return concatBytes(payload, textEncoder.encode(nextKey), external?.signature ?? new Uint8Array());
}

function sealMessage(link: ChainLink): Uint8Array {
  return concatBytes(link.payload, textEncoder.encode(link.nextKeyText), link.signature);
}

function decodeCode(source: string, index: number): BlockCode {
  try {
    return parseBlock(source);
  } catch (error) {
    throw new TokenError(`Invalid Datalog in block ${index}: ${errorMessage(error)}`, { cause: error });
  }
}

function decodeLink(wire: SignedBlockWire, index: number): ChainLink {
  const payload = decodeField(wire.payload, `block ${index} payload`);
  const contents = parseBlockPayload(payload);
  const signature = decodeField(wire.signature, `block ${index} signature`);
  const external: ExternalSignature | undefined = wire.external && {
    publicKey: PublicKey.fromString(wire.external.publicKey),
    signature: decodeField(wire.external.signature, `block ${index} external signature`),
  };

  return {
    payload,
    nextKeyText: wire.nextKey,
    nextKey: PublicKey.fromString(wire.nextKey),
    signature,
    ...(external ? { external } : {}),
    block: {
      index,
      code: decodeCode(contents.code, index),
      source: contents.code,
      ...(contents.context !== undefined ? { context: contents.context } : {}),
      ...(external ? { externalKey: external.publicKey } : {}),
      revocationId: bytesToHex(signature),
    },
  };
}

function signLink(
  index: number,
  payload: Uint8Array,
  signer: PrivateKey,
  nextKey: PublicKey,
  external?: ExternalSignature
): ChainLink {
  const nextKeyText = nextKey.toString();
  const wire: SignedBlockWire = {
    payload: toBase64(payload),
    nextKey: nextKeyText,
    signature: toBase64(signer.sign(signedMessage(payload, nextKeyText, external))),
    ...(external
      ? { external: { publicKey: external.publicKey.toString(), signature: toBase64(external.signature) } }
      : {}),
  };
  return decodeLink(wire, index);
}

function toWire(link: ChainLink): SignedBlockWire {
  return {
    payload: toBase64(link.payload),
    nextKey: link.nextKeyText,
    signature: toBase64(link.signature),
    ...(link.external
      ? { external: { publicKey: link.external.publicKey.toString(), signature: toBase64(link.external.signature) } }
      : {}),
  };
}

export class Biscuit {
  private constructor(
    private readonly links: readonly ChainLink[],
    private readonly proof: Proof,
    readonly rootKeyId: number | undefined
  ) {}

  /**
   * Sign an authority block with the root key
   */
  static build(authority: BlockBuilder, rootKey: PrivateKey): Biscuit {
    const next = PrivateKey.generate();
    const link = signLink(0, authority.build(), rootKey, next.publicKey());
    const rootKeyId = authority instanceof AuthorityBuilder ? authority.rootKeyId : undefined;
    return new Biscuit([link], { type: 'next', secret: next }, rootKeyId);
  }

  /**
   * Deserialize a token. The chain after the authority block and the proof
   * are always checked; the authority signature is checked when a root key is
   * given.
   */
  static fromBytes(bytes: Uint8Array, rootKey?: PublicKey): Biscuit {
    const wire = parseTokenWire(bytes);
    const links = wire.blocks.map((block, index) => decodeLink(block, index));
    const proof: Proof =
      'finalSignature' in wire.proof
        ? { type: 'final', signature: decodeField(wire.proof.finalSignature, 'final signature') }
        : { type: 'next', secret: PrivateKey.fromString(wire.proof.nextSecret) };

    const biscuit = new Biscuit(links, proof, wire.rootKeyId);
    biscuit.checkChain();
    if (rootKey) {
      biscuit.verify(rootKey);
    }
    return biscuit;
  }

  static fromBase64(text: string, rootKey?: PublicKey): Biscuit {
    let bytes: Uint8Array;
    try {
      bytes = fromBase64(text);
    } catch (error) {
      throw new TokenError(`Invalid base64 token: ${errorMessage(error)}`, { cause: error });
    }
    return Biscuit.fromBytes(bytes, rootKey);
  }

  get sealed(): boolean {
    return this.proof.type === 'final';
  }

  get blockCount(): number {
    return this.links.length;
  }

  blocks(): Block[] {
    return this.links.map((link) => link.block);
  }

  revocationIds(): string[] {
    return this.links.map((link) => link.block.revocationId);
  }

  /**
   * Check that the authority block was signed by `rootKey`
   */
  verify(rootKey: PublicKey): void {
    const authority = this.links[0];
    if (!rootKey.verify(signedMessage(authority.payload, authority.nextKeyText, authority.external), authority.signature)) {
      throw new TokenError('Signature verification failed: the token was not signed by this root key');
    }
  }

  append(builder: BlockBuilder): Biscuit {
    const secret = this.nextSecret('append a block to');
    const next = PrivateKey.generate();
    const link = signLink(this.links.length, builder.build(), secret, next.publicKey());
    return new Biscuit([...this.links, link], { type: 'next', secret: next }, this.rootKeyId);
  }

  /**
   * Append a block signed by a third party for this token
   */
  appendThirdParty(block: ThirdPartyBlock): Biscuit {
    const secret = this.nextSecret('append a third-party block to');
    if (!block.matches(this.last.signature)) {
      throw new TokenError('The third-party block was not signed for this token');
    }
    const next = PrivateKey.generate();
    const external: ExternalSignature = { publicKey: block.externalKey, signature: block.externalSignature };
    const link = signLink(this.links.length, block.payload, secret, next.publicKey(), external);
    return new Biscuit([...this.links, link], { type: 'next', secret: next }, this.rootKeyId);
  }

  thirdPartyRequest(): ThirdPartyRequest {
    this.nextSecret('request a third-party block for');
    return new ThirdPartyRequest(this.last.signature);
  }

  /**
   * Replace the proof with a final signature; the result cannot be attenuated
   */
  seal(): Biscuit {
    const secret = this.nextSecret('seal');
    return new Biscuit(this.links, { type: 'final', signature: secret.sign(sealMessage(this.last)) }, this.rootKeyId);
  }

  toBytes(): Uint8Array {
    const wire: TokenWire = {
      version: FORMAT_VERSION,
      ...(this.rootKeyId !== undefined ? { rootKeyId: this.rootKeyId } : {}),
      blocks: this.links.map(toWire),
      proof:
        this.proof.type === 'final'
          ? { finalSignature: toBase64(this.proof.signature) }
          : { nextSecret: this.proof.secret.toString() },
    };
    return canonicalBytes(wire);
  }

  toBase64(): string {
    return toBase64(this.toBytes());
  }

  private get last(): ChainLink {
    return this.links[this.links.length - 1];
  }

  private nextSecret(action: string): PrivateKey {
    if (this.proof.type === 'final') {
      throw new TokenError(`Cannot ${action} a sealed token`);
    }
    return this.proof.secret;
  }

  /**
   * Check every signature that does not depend on the root key
   */
  private checkChain(): void {
    if (this.links[0].external) {
      throw new TokenError('The authority block cannot be signed by a third party');
    }

    for (let i = 1; i < this.links.length; i++) {
      const previous = this.links[i - 1];
      const link = this.links[i];
      if (
        link.external &&
        !link.external.publicKey.verify(externalSignedMessage(link.payload, previous.signature), link.external.signature)
      ) {
        throw new TokenError(`Invalid external signature on block ${i}`);
      }
      if (!previous.nextKey.verify(signedMessage(link.payload, link.nextKeyText, link.external), link.signature)) {
        throw new TokenError(`Invalid signature on block ${i}`);
      }
    }

    const last = this.last;
    if (this.proof.type === 'next') {
      if (!this.proof.secret.publicKey().equals(last.nextKey)) {
        throw new TokenError('Invalid proof: the next secret does not match the last block');
      }
    } else if (!last.nextKey.verify(sealMessage(last), this.proof.signature)) {
      throw new TokenError('Invalid proof: bad final signature');
    }
  }
}
