import { ethers } from 'ethers'
import { KeyPairSigner, manifestDigest, recoverPublicKey } from '../signer'

describe('KeyPairSigner', () => {
  const account = 'account_sim1' + '1'.repeat(40)

  it('derives the same compressed key from the same seed', () => {
    const first = KeyPairSigner.fromSeed(account, 'account-key:1')
    const second = KeyPairSigner.fromSeed(account, 'account-key:1')

    expect(first.publicKey).toBe(second.publicKey)
    expect(first.publicKey).toMatch(/^0x0[23][0-9a-f]{64}$/)
    expect(first.account).toBe(account)
  })

  it('derives different keys from different seeds', () => {
    const first = KeyPairSigner.fromSeed(account, 'account-key:1')
    const second = KeyPairSigner.fromSeed(account, 'account-key:2')

    expect(first.publicKey).not.toBe(second.publicKey)
  })

  it('produces signatures the signer key can be recovered from', () => {
    const signer = KeyPairSigner.fromSeed(account, 'account-key:1')
    const digest = manifestDigest('CALL_METHOD\n    Address("account_sim1")\n    "lock_fee"\n;')

    expect(recoverPublicKey(digest, signer.sign(digest))).toBe(signer.publicKey)
  })

  it('accepts a raw private key', () => {
    const privateKey = ethers.id('test-secret')
    const signer = new KeyPairSigner(account, privateKey)

    expect(signer.publicKey).toBe(new ethers.SigningKey(privateKey).compressedPublicKey)
  })
})

describe('manifestDigest', () => {
  it('hashes the manifest text with keccak256', () => {
    expect(manifestDigest('hello')).toBe(ethers.keccak256(ethers.toUtf8Bytes('hello')))
    expect(manifestDigest('hello')).not.toBe(manifestDigest('hello '))
  })
})

describe('recoverPublicKey', () => {
  it('returns undefined for a malformed signature', () => {
    expect(recoverPublicKey(manifestDigest('hello'), '0x1234')).toBeUndefined()
  })

  it('recovers a different key for a different digest', () => {
    const signer = KeyPairSigner.fromSeed('account_x', 'account-key:1')
    const signature = signer.sign(manifestDigest('one'))

    expect(recoverPublicKey(manifestDigest('two'), signature)).not.toBe(signer.publicKey)
  })
})
