import { httpRequest, type FetchLike } from '../internal/http';

export interface SitesCapabilityConfig {
  /** BETYdb root; sites and experiments are read from its v1 API. */
  baseUrl: string;
  key?: string | null;
  timeoutMs?: number | null;
  fetchImpl?: FetchLike;
}

export interface LatLon {
  lat: number;
  lon: number;
}

export interface SiteCandidate {
  id: string | null;
  sitename: string;
  /** Site boundary as Well-Known Text. */
  geometry: string;
}

export interface SitesCapability {
  /**
   * Sites whose boundary contains the coordinate. With a `filterDate`, only
   * sites attached to an experiment running on that date are returned.
   */
  findSitesByLatLon(latLon: LatLon, filterDate?: string | null): Promise<SiteCandidate[]>;
}

type Envelope = Record<string, unknown>;

function toRecord(value: unknown): Envelope | null {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return value as Envelope;
  }
  return null;
}

function toIdentifier(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }
  return null;
}

/** BETYdb wraps every entry as `{ <resource>: {...} }` inside `data`; bare entries are accepted too. */
function unwrapEntries(payload: unknown, resource: string): Envelope[] {
  const data = toRecord(payload)?.data;
  if (!Array.isArray(data)) {
    return [];
  }
  const entries: Envelope[] = [];
  for (const item of data) {
    const record = toRecord(item);
    if (!record) {
      continue;
    }
    entries.push(toRecord(record[resource]) ?? record);
  }
  return entries;
}

function toDay(value: unknown): string | null {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }
  const parsed = new Date(value.trim());
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }
  return parsed.toISOString().slice(0, 10);
}

export function createSitesCapability(config: SitesCapabilityConfig): SitesCapability {
  const request = async (resource: string, query: Record<string, string>): Promise<Envelope[]> => {
    const response = await httpRequest<unknown>({
      baseUrl: config.baseUrl,
      path: `/api/v1/${resource}`,
      method: 'GET',
      query,
      apiKey: config.key,
      timeoutMs: config.timeoutMs,
      fetchImpl: config.fetchImpl,
      expectJson: true
    });
    return unwrapEntries(response.data, resource.replace(/s$/, ''));
  };

  async function siteIdsActiveOn(date: string): Promise<Set<string>> {
    const experiments = await request('experiments', { associations_mode: 'full_info', limit: 'none' });
    const ids = new Set<string>();
    for (const experiment of experiments) {
      const start = toDay(experiment.start_date);
      const end = toDay(experiment.end_date);
      if (!start || !end || date < start || date > end) {
        continue;
      }
      const sites = Array.isArray(experiment.sites) ? experiment.sites : [];
      for (const entry of sites) {
        const record = toRecord(entry);
        const site = toRecord(record?.site) ?? record;
        const id = toIdentifier(site?.id);
        if (id) {
          ids.add(id);
        }
      }
    }
    return ids;
  }

  return {
    async findSitesByLatLon(latLon: LatLon, filterDate?: string | null): Promise<SiteCandidate[]> {
      const sites = await request('sites', {
        containing: `${latLon.lat},${latLon.lon}`,
        limit: 'none'
      });

      const candidates: SiteCandidate[] = [];
      for (const site of sites) {
        const sitename = typeof site.sitename === 'string' ? site.sitename.trim() : '';
        const geometry = typeof site.geometry === 'string' ? site.geometry.trim() : '';
        if (!sitename || !geometry) {
          continue;
        }
        candidates.push({ id: toIdentifier(site.id), sitename, geometry });
      }

      const day = toDay(filterDate);
      if (!day || candidates.length === 0) {
        return candidates;
      }
      const active = await siteIdsActiveOn(day);
      return candidates.filter((candidate) => candidate.id !== null && active.has(candidate.id));
    }
  } satisfies SitesCapability;
}
