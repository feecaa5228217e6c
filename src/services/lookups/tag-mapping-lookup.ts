/**
 * Tag Mapping Lookup Services
 * Supplies the original-name → mapped-name table used to normalize tags
 * @module services/lookups/tag-mapping-lookup
 */

import type { TagMappingPair, TagMappingService } from '../types'
import {
  ServiceConfigurationError,
  ServiceMalformedResponseError,
  ServiceNetworkError,
  ServiceRejectedError,
  ServiceServerError,
} from '../service-error'

/**
 * Fetch implementation used by the HTTP service; defaults to the global fetch
 */
export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>

/**
 * Configuration for the HTTP tag mapping service
 */
export interface HttpTagMappingConfig {
  /** Absolute URL returning a JSON array of `{ name, mapped_name }` objects */
  endpoint: string

  /** Extra request headers (e.g. an API key) */
  headers?: Record<string, string>

  /** Service name used in logs and errors (default: 'tag-mapping-http') */
  name?: string

  /** Custom fetch implementation */
  fetch?: FetchFunction
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validates a tag mapping payload and converts it to mapping pairs.
 *
 * The payload must be an array of objects with a string `name`. The mapped
 * name is read from `mapped_name` (or `mappedName`); entries without one
 * carry no mapping and are skipped.
 *
 * @throws ServiceMalformedResponseError when the payload has the wrong shape
 *
 * @example
 * ```typescript
 * parseTagMappingPayload([{ name: 'VIP', mapped_name: 'Major Donor' }], 'tags')
 * // [{ name: 'VIP', mappedName: 'Major Donor' }]
 * ```
 */
export function parseTagMappingPayload(
  payload: unknown,
  serviceName: string
): TagMappingPair[] {
  if (!Array.isArray(payload)) {
    throw new ServiceMalformedResponseError(serviceName, 'expected an array of mappings')
  }

  const pairs: TagMappingPair[] = []
  payload.forEach((entry: unknown, index) => {
    if (!isPlainObject(entry) || typeof entry.name !== 'string') {
      throw new ServiceMalformedResponseError(
        serviceName,
        `entry ${index} has no string 'name'`,
        { index }
      )
    }

    const mapped = entry.mapped_name ?? entry.mappedName
    if (mapped == null) return
    if (typeof mapped !== 'string') {
      throw new ServiceMalformedResponseError(
        serviceName,
        `entry ${index} has a non-string mapped name`,
        { index }
      )
    }

    pairs.push({ name: entry.name, mappedName: mapped })
  })

  return pairs
}

/**
 * Tag mapping service backed by a single HTTP GET.
 *
 * Non-success responses, network failures and malformed bodies are thrown
 * as service errors; the caller decides how to degrade.
 *
 * @example
 * ```typescript
 * const service = createHttpTagMappingService({
 *   endpoint: 'https://tags.example.org/api/v1/tags',
 * })
 * const pairs = await service.fetchMappings()
 * ```
 */
export function createHttpTagMappingService(
  config: HttpTagMappingConfig
): TagMappingService {
  const serviceName = config.name ?? 'tag-mapping-http'

  let url: URL
  try {
    url = new URL(config.endpoint)
  } catch {
    throw new ServiceConfigurationError('endpoint', 'must be an absolute URL', {
      endpoint: config.endpoint,
    })
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ServiceConfigurationError('endpoint', 'must use http or https', {
      endpoint: config.endpoint,
    })
  }

  const doFetch: FetchFunction = config.fetch ?? ((input, init) => fetch(input, init))

  return {
    name: serviceName,
    description: `Fetches tag name mappings from ${url.origin}`,

    async fetchMappings(signal?: AbortSignal): Promise<TagMappingPair[]> {
      let response: Response
      try {
        response = await doFetch(url.toString(), {
          method: 'GET',
          headers: { Accept: 'application/json', ...config.headers },
          signal,
        })
      } catch (error) {
        throw new ServiceNetworkError(
          serviceName,
          error instanceof Error ? error.message : String(error),
          error instanceof Error ? error : undefined
        )
      }

      if (response.status >= 500) {
        throw new ServiceServerError(serviceName, response.statusText, response.status)
      }
      if (!response.ok) {
        throw new ServiceRejectedError(
          serviceName,
          `HTTP ${response.status} ${response.statusText}`.trim(),
          response.status
        )
      }

      let payload: unknown
      try {
        payload = await response.json()
      } catch (error) {
        throw new ServiceMalformedResponseError(
          serviceName,
          `body is not valid JSON (${error instanceof Error ? error.message : String(error)})`
        )
      }

      return parseTagMappingPayload(payload, serviceName)
    },
  }
}

/**
 * Tag mapping service that serves a fixed list, for tests and offline runs
 */
export function createStaticTagMappingService(
  pairs: readonly TagMappingPair[],
  name: string = 'tag-mapping-static'
): TagMappingService {
  return {
    name,
    description: `Serves ${pairs.length} fixed tag mappings`,
    fetchMappings: async () => pairs.map((pair) => ({ ...pair })),
  }
}
