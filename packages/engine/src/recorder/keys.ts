/**
 * Normalize a key name handed over by an input hook.
 *
 * Hooks report special keys as `Key.space`, `Key.shift_l` and the like;
 * the prefix is dropped and named keys are lowercased. Single characters
 * keep their case, since `Q` and `q` are different inputs to a game.
 */
export function normalizeKey(raw: string): string {
  let key = raw.trim();
  if (key.startsWith('Key.')) key = key.slice(4);
  if (key.length > 1) key = key.toLowerCase();
  return key;
}
