import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { TransportError } from '../../errors.js';
import { logger } from '../../logger.js';
import { toTransportError } from '../http.js';
import type { CatalogEntry, CatalogIndex, FindScenesResponse, StashScene } from './types.js';

const FIND_SCENES_QUERY = `
  query FindScenes($filter: FindFilterType!) {
    findScenes(filter: $filter) {
      count
      scenes {
        id
        title
        date
        studio {
          name
        }
        stash_ids {
          endpoint
          stash_id
        }
        performers {
          name
        }
        files {
          path
        }
      }
    }
  }
`;

export interface StashClientOptions {
  url: string;
  apiKey: string;
  stashIdEndpoint?: string;
  perPage?: number;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

export function toCatalogEntry(scene: StashScene, stashIdEndpoint: string): CatalogEntry {
  const match = scene.stash_ids.find((ref) => ref.endpoint.includes(stashIdEndpoint) && ref.stash_id);

  return {
    id: scene.id,
    title: scene.title || 'Unknown',
    date: scene.date ?? undefined,
    studio: scene.studio?.name ?? undefined,
    performers: scene.performers.flatMap((performer) => (performer.name ? [performer.name] : [])),
    files: scene.files.map((file) => file.path),
    stashId: match?.stash_id,
    endpoint: match?.endpoint,
  };
}

export class StashClient implements CatalogIndex {
  private client: AxiosInstance;
  private stashIdEndpoint: string;
  private perPage: number;

  constructor(options: StashClientOptions) {
    this.stashIdEndpoint = options.stashIdEndpoint ?? 'stashdb.org';
    this.perPage = options.perPage ?? 100;

    this.client = axios.create({
      baseURL: options.url.replace(/\/+$/, ''),
      timeout: options.timeoutMs ?? 30_000,
      headers: {
        ApiKey: options.apiKey,
        'Content-Type': 'application/json',
      },
      adapter: options.adapter,
    });
  }

  // Fetch every scene, one page at a time, sorted by id
  async findScenes(): Promise<StashScene[]> {
    const scenes: StashScene[] = [];
    let page = 1;

    while (true) {
      let body: FindScenesResponse;
      try {
        const response = await this.client.post<FindScenesResponse>('/graphql', {
          query: FIND_SCENES_QUERY,
          variables: {
            filter: { page, per_page: this.perPage, sort: 'id', direction: 'ASC' },
          },
        });
        body = response.data;
      } catch (error) {
        throw toTransportError('stash', 'findScenes', error);
      }

      if (body.errors && body.errors.length > 0) {
        throw new TransportError('stash', 'findScenes', body.errors.map((e) => e.message).join('; '), {
          body: body.errors,
        });
      }

      const result = body.data?.findScenes;
      const pageScenes = result?.scenes ?? [];
      if (pageScenes.length === 0) {
        break;
      }

      scenes.push(...pageScenes);
      const total = result?.count ?? 0;
      logger.debug(`  Fetched ${scenes.length}/${total} scenes...`);

      if (scenes.length >= total) {
        break;
      }
      page++;
    }

    return scenes;
  }

  async listEntries(): Promise<CatalogEntry[]> {
    const scenes = await this.findScenes();
    return scenes.map((scene) => toCatalogEntry(scene, this.stashIdEndpoint));
  }
}
