import { ethers } from 'ethers'
import { TransactionSigner } from '../ledger/backend'
import { EntityAddress } from '../types/references'

/**
 * Signs transaction digests with a local secp256k1 key.
 */
export class KeyPairSigner implements TransactionSigner {
  private readonly signingKey: ethers.SigningKey
  public readonly publicKey: string

  constructor(
    public readonly account: EntityAddress,
    privateKey: string
  ) {
    this.signingKey = new ethers.SigningKey(privateKey)
    this.publicKey = this.signingKey.compressedPublicKey
  }

  /**
   * Derives a key deterministically from a seed, so that repeated runs produce the same keys.
   */
  public static fromSeed(account: EntityAddress, seed: string): KeyPairSigner {
    return new KeyPairSigner(account, ethers.id(seed))
  }

  public sign(digest: string): string {
    return ethers.Signature.from(this.signingKey.sign(digest)).serialized
  }
}

/**
 * The digest signers sign: keccak256 of the rendered manifest.
 */
export function manifestDigest(manifest: string): string {
  return ethers.keccak256(ethers.toUtf8Bytes(manifest))
}

/**
 * Recovers the compressed public key that produced a signature, or undefined if the
 * signature is malformed.
 */
export function recoverPublicKey(digest: string, signature: string): string | undefined {
  try {
    return ethers.SigningKey.computePublicKey(ethers.SigningKey.recoverPublicKey(digest, signature), true)
  } catch (error) {
    return undefined
  }
}
