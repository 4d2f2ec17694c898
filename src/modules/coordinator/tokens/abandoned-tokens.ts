/**
 * Runs the release side effect of tokens that were dropped without being released.
 *
 * Held values must not reference the token itself, otherwise it never becomes unreachable.
 * Tokens unregister themselves on explicit release so the effect fires once.
 */
export const abandonedTokens = new FinalizationRegistry<() => void>(release => {
  release();
});
