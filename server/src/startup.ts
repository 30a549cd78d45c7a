import type { RecordStore } from './store/recordStore'

/**
 * Rewrites backslash-separated stored paths once at boot. A catalog that
 * cannot be read is left for request handlers to report as STORE_CORRUPT;
 * the server still starts.
 */
export async function healStoredPaths(records: RecordStore): Promise<number> {
  try {
    const healed = await records.normalizeStoredPaths()
    if (healed > 0) {
      console.log(`[startup] normalized ${healed} stored file path(s) to forward slashes`)
    }
    return healed
  } catch (err) {
    console.warn('[startup] normalize failed', err)
    return 0
  }
}
