/**
 * Minimal structured logger for @sweepr/engine.
 *
 * Respects SWEEPR_LOG_LEVEL env var (debug | info | warn | error | silent).
 * Writes to stderr so stdout stays clean for report output.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;
type Level = keyof typeof LEVELS;

function isLevel(raw: string): raw is Level {
  return Object.prototype.hasOwnProperty.call(LEVELS, raw);
}

function parseLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  const key = raw.toLowerCase();
  return isLevel(key) ? LEVELS[key] : LEVELS.info;
}

// Read on every call: the CLI adjusts the variable after this module loads.
function currentLevel(): number {
  return parseLevel(process.env.SWEEPR_LOG_LEVEL);
}

export const logger = {
  debug(msg: string) { if (currentLevel() <= LEVELS.debug) process.stderr.write(`[sweepr] ${msg}\n`); },
  info(msg: string)  { if (currentLevel() <= LEVELS.info)  process.stderr.write(`[sweepr] ${msg}\n`); },
  warn(msg: string)  { if (currentLevel() <= LEVELS.warn)  process.stderr.write(`[sweepr] ${msg}\n`); },
  error(msg: string) { if (currentLevel() <= LEVELS.error) process.stderr.write(`[sweepr] ${msg}\n`); },
};
