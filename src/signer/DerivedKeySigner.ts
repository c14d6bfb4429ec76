import { ethers } from "ethers";

import { OracleError } from "../errors";

export interface TransactionSigner {
  getAddress(): Promise<string>;
  signTransaction(tx: ethers.utils.UnsignedTransaction): Promise<ethers.Signature>;
}

/** Hands out the signer that publishes on behalf of an oracle owner. */
export interface SignerProvider {
  forOwner(owner: string): TransactionSigner;
}

export class LocalKeySigner implements TransactionSigner {
  private readonly signingKey: ethers.utils.SigningKey;

  constructor(privateKey: string) {
    this.signingKey = new ethers.utils.SigningKey(privateKey);
  }

  async getAddress(): Promise<string> {
    return ethers.utils.computeAddress(this.signingKey.publicKey);
  }

  async signTransaction(tx: ethers.utils.UnsignedTransaction): Promise<ethers.Signature> {
    const digest = ethers.utils.keccak256(ethers.utils.serializeTransaction(tx));
    return this.signingKey.signDigest(digest);
  }
}

/**
 * One key per owner, derived as keccak256(seed ‖ owner). Owners never share a nonce space,
 * and the same seed yields the same publishing addresses after a restart.
 */
export class DerivedKeySigner implements SignerProvider {
  private readonly seed: string;
  private readonly cache = new Map<string, LocalKeySigner>();

  constructor(seed: string) {
    if (!ethers.utils.isHexString(seed, 32)) {
      throw new OracleError("signer seed must be a 32-byte hex string", "InvalidParams");
    }
    this.seed = seed;
  }

  forOwner(owner: string): TransactionSigner {
    const normalized = ethers.utils.getAddress(owner);
    const cached = this.cache.get(normalized);
    if (cached) return cached;

    const privateKey = ethers.utils.keccak256(ethers.utils.solidityPack(["bytes32", "address"], [this.seed, normalized]));
    const signer = new LocalKeySigner(privateKey);
    this.cache.set(normalized, signer);
    return signer;
  }
}
