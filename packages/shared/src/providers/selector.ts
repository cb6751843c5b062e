// =============================================================================
// @newsdesk/shared — Provider selection
// =============================================================================
// Pure decision over which synthesis backend to use. No I/O: the caller
// logs substitutions from the returned record.
// =============================================================================

import { CREDENTIAL_KEYS, PROVIDER_PRIORITY } from "../config.js";
import { ConfigurationError } from "../errors.js";
import type { ProviderName } from "../types.js";

export interface ProviderSelection {
  requested: ProviderName;
  provider: ProviderName;
  /** True when the requested provider was unavailable and a fallback was taken */
  substituted: boolean;
}

/**
 * Returns the requested provider when it is available, otherwise the first
 * available provider in `priority` order.
 *
 * @throws ConfigurationError when no provider is available
 */
export function selectProvider(
  requested: ProviderName,
  available: ReadonlySet<ProviderName> | readonly ProviderName[],
  priority: readonly ProviderName[] = PROVIDER_PRIORITY,
): ProviderSelection {
  const usable = new Set<ProviderName>(available);

  if (usable.has(requested)) {
    return { requested, provider: requested, substituted: false };
  }

  const fallback: ProviderName | undefined =
    priority.find((name) => usable.has(name)) ?? Array.from(usable)[0];
  if (fallback === undefined) {
    const keys = PROVIDER_PRIORITY.map((name) => CREDENTIAL_KEYS[name]);
    throw new ConfigurationError(
      "API_KEYS",
      `No LLM API keys configured. Set at least one of: ${keys.join(", ")}`,
    );
  }

  return { requested, provider: fallback, substituted: true };
}
