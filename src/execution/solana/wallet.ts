import { Keypair, VersionedTransaction } from '@solana/web3.js';
import bs58 from 'bs58';

export const LAMPORTS_PER_SOL = 1_000_000_000;
export const SOL_MINT = 'So11111111111111111111111111111111111111112';

export function solToLamports(sol: number): number {
  return Math.round(sol * LAMPORTS_PER_SOL);
}

export function lamportsToSol(lamports: number): number {
  return lamports / LAMPORTS_PER_SOL;
}

/**
 * Accepts a base58 secret key or a JSON byte array as written by
 * `solana-keygen`.
 */
export function loadKeypair(secret: string): Keypair {
  const trimmed = secret.trim();
  if (trimmed.startsWith('[')) {
    const parsed: unknown = JSON.parse(trimmed);
    if (!Array.isArray(parsed) || !parsed.every((n) => typeof n === 'number')) {
      throw new Error('Secret key JSON must be an array of numbers');
    }
    return Keypair.fromSecretKey(Uint8Array.from(parsed));
  }
  return Keypair.fromSecretKey(bs58.decode(trimmed));
}

export function loadKeypairFromEnv(env: NodeJS.ProcessEnv = process.env): Keypair | null {
  const secret = env.SOLANA_PRIVATE_KEY;
  return secret ? loadKeypair(secret) : null;
}

/**
 * Sign a base64 versioned transaction (as returned by a swap API) and return
 * the wire bytes.
 */
export function signSerializedTransaction(base64: string, signer: Keypair): Uint8Array {
  const tx = VersionedTransaction.deserialize(Buffer.from(base64, 'base64'));
  tx.sign([signer]);
  return tx.serialize();
}
