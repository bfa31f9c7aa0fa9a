import crypto from 'crypto';

/**
 * Generate SHA-256 hash for a generation run's PRNG seed
 */
export function generateSeed(playlistName: string, generatedAtISO: string): string {
  return crypto.createHash('sha256')
    .update(`${playlistName.toLowerCase()}|${generatedAtISO}`)
    .digest('hex');
}
