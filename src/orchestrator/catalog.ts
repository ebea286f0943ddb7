/**
 * Model catalog: public labels mapped onto provider/model pairs, and the
 * candidate list a request resolves to.
 */

import { modelKey, type CatalogEntry, type DispatchRequest, type ProviderCapability } from '@switchyard/core';
import type { Candidate } from '@switchyard/fallback';
import { UnknownModelError } from './errors.js';

const AUTO = 'auto';

function explicit(value: string | undefined): string | undefined {
  return value === undefined || value === AUTO ? undefined : value;
}

/**
 * Catalog for the registered providers. Configured entries come first;
 * without any, every model a provider declares is listed under its key.
 */
export function buildCatalog(
  configured: readonly CatalogEntry[],
  providers: readonly ProviderCapability[],
): CatalogEntry[] {
  const registered = new Set(providers.map((p) => p.id));
  const entries = configured.filter((entry) => registered.has(entry.provider));
  if (configured.length > 0) {
    return entries;
  }
  return providers.flatMap((p) =>
    p.models.map((model) => ({ label: modelKey(p.id, model), provider: p.id, model })),
  );
}

export function toCandidate(entry: CatalogEntry): Candidate {
  return { provider: entry.provider, model: entry.model, key: modelKey(entry.provider, entry.model), label: entry.label };
}

/**
 * Candidates for `request` in catalog order, one per provider/model pair.
 *
 * @throws UnknownModelError when the provider or model matches nothing
 */
export function resolveCandidates(
  request: Pick<DispatchRequest, 'provider' | 'model'>,
  catalog: readonly CatalogEntry[],
): Candidate[] {
  const provider = explicit(request.provider);
  const model = explicit(request.model);

  let entries = catalog;
  if (provider !== undefined) {
    entries = entries.filter((e) => e.provider === provider);
    if (entries.length === 0) {
      throw new UnknownModelError('provider', provider);
    }
  }
  if (model !== undefined) {
    entries = entries.filter((e) => e.label === model || e.model === model);
  }
  if (entries.length === 0) {
    throw new UnknownModelError('model', model ?? AUTO);
  }

  const seen = new Set<string>();
  const candidates: Candidate[] = [];
  for (const entry of entries) {
    const candidate = toCandidate(entry);
    if (seen.has(candidate.key)) continue;
    seen.add(candidate.key);
    candidates.push(candidate);
  }
  return candidates;
}
