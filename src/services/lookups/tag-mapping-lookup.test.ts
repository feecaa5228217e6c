/**
 * Tests for the tag mapping lookup services
 */

import { describe, it, expect, vi } from 'vitest'
import {
  createHttpTagMappingService,
  createStaticTagMappingService,
  parseTagMappingPayload,
} from './tag-mapping-lookup'
import {
  ServiceConfigurationError,
  ServiceMalformedResponseError,
  ServiceNetworkError,
  ServiceRejectedError,
  ServiceServerError,
} from '../service-error'

const ENDPOINT = 'https://tags.example.test/api/tags'

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

function mockFetch(response: Response) {
  return vi.fn(async (_input: string, _init?: RequestInit) => response)
}

describe('parseTagMappingPayload', () => {
  it('reads mapped_name and mappedName', () => {
    expect(
      parseTagMappingPayload(
        [
          { name: 'VIP', mapped_name: 'Major Donor' },
          { name: 'Gala', mappedName: 'Event' },
        ],
        'tags'
      )
    ).toEqual([
      { name: 'VIP', mappedName: 'Major Donor' },
      { name: 'Gala', mappedName: 'Event' },
    ])
  })

  it('skips entries without a mapped name', () => {
    expect(parseTagMappingPayload([{ name: 'VIP', mapped_name: null }, { name: 'X' }], 'tags')).toEqual([])
  })

  it('rejects a payload that is not an array', () => {
    expect(() => parseTagMappingPayload({ tags: [] }, 'tags')).toThrow(
      "Malformed response from service 'tags': expected an array of mappings"
    )
  })

  it('rejects entries without a string name', () => {
    expect(() => parseTagMappingPayload([{ name: 'ok', mapped_name: 'ok' }, { name: 3 }], 'tags')).toThrow(
      "entry 1 has no string 'name'"
    )
  })

  it('rejects non-string mapped names', () => {
    expect(() => parseTagMappingPayload([{ name: 'VIP', mapped_name: 7 }], 'tags')).toThrow(
      ServiceMalformedResponseError
    )
  })
})

describe('createHttpTagMappingService', () => {
  it('rejects invalid endpoints at creation', () => {
    expect(() => createHttpTagMappingService({ endpoint: 'not a url' })).toThrow(
      ServiceConfigurationError
    )
    expect(() => createHttpTagMappingService({ endpoint: 'ftp://tags.example.test' })).toThrow(
      'must use http or https'
    )
  })

  it('performs a single GET and parses the pairs', async () => {
    const fetch = mockFetch(jsonResponse([{ name: 'VIP', mapped_name: 'Major Donor' }]))
    const service = createHttpTagMappingService({
      endpoint: ENDPOINT,
      headers: { Authorization: 'Bearer test-secret' },
      fetch,
    })

    const pairs = await service.fetchMappings()

    expect(pairs).toEqual([{ name: 'VIP', mappedName: 'Major Donor' }])
    expect(fetch).toHaveBeenCalledTimes(1)
    expect(fetch).toHaveBeenCalledWith(ENDPOINT, {
      method: 'GET',
      headers: { Accept: 'application/json', Authorization: 'Bearer test-secret' },
      signal: undefined,
    })
  })

  it('forwards the abort signal', async () => {
    const fetch = mockFetch(jsonResponse([]))
    const service = createHttpTagMappingService({ endpoint: ENDPOINT, fetch })
    const controller = new AbortController()

    await service.fetchMappings(controller.signal)

    expect(fetch).toHaveBeenCalledWith(
      ENDPOINT,
      expect.objectContaining({ signal: controller.signal })
    )
  })

  it('maps 4xx responses to ServiceRejectedError', async () => {
    const service = createHttpTagMappingService({
      endpoint: ENDPOINT,
      fetch: mockFetch(new Response('nope', { status: 404, statusText: 'Not Found' })),
    })

    await expect(service.fetchMappings()).rejects.toBeInstanceOf(ServiceRejectedError)
  })

  it('maps 5xx responses to ServiceServerError', async () => {
    const service = createHttpTagMappingService({
      endpoint: ENDPOINT,
      fetch: mockFetch(new Response('down', { status: 503, statusText: 'Service Unavailable' })),
    })

    await expect(service.fetchMappings()).rejects.toBeInstanceOf(ServiceServerError)
  })

  it('maps fetch failures to ServiceNetworkError', async () => {
    const service = createHttpTagMappingService({
      endpoint: ENDPOINT,
      fetch: vi.fn(async () => {
        throw new TypeError('fetch failed')
      }),
    })

    await expect(service.fetchMappings()).rejects.toBeInstanceOf(ServiceNetworkError)
  })

  it('maps an invalid JSON body to ServiceMalformedResponseError', async () => {
    const service = createHttpTagMappingService({
      endpoint: ENDPOINT,
      fetch: mockFetch(new Response('<html>', { status: 200 })),
    })

    await expect(service.fetchMappings()).rejects.toBeInstanceOf(ServiceMalformedResponseError)
  })

  it('uses the configured name', () => {
    const service = createHttpTagMappingService({ endpoint: ENDPOINT, name: 'crm-tags' })
    expect(service.name).toBe('crm-tags')
  })
})

describe('createStaticTagMappingService', () => {
  it('serves copies of the fixed pairs', async () => {
    const pairs = [{ name: 'VIP', mappedName: 'Major Donor' }]
    const service = createStaticTagMappingService(pairs)

    const served = await service.fetchMappings()

    expect(served).toEqual(pairs)
    expect(served[0]).not.toBe(pairs[0])
    expect(service.name).toBe('tag-mapping-static')
  })
})
