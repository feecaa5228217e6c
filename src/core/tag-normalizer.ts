/**
 * Tag parsing, remapping and usage counts
 * @module core/tag-normalizer
 */

import type { CellValue } from '../types/record'
import type { TagCountRow } from '../types/output'
import type {
  Logger,
  ServiceResult,
  TagMappingPair,
  TagMappingService,
} from '../services/types'
import { toServiceErrorInfo } from '../services/service-error'
import { withAbortableTimeout } from '../services/resilience/timeout'
import { DEFAULT_TAG_MAPPING_TIMEOUT_MS } from '../types/config'
import { cleanString, uniqueInOrder } from './normalizers/basic'

/**
 * Original tag name → reported tag name
 */
export type TagMapping = ReadonlyMap<string, string>

/**
 * Tags assigned to one constituent
 */
export interface TagAssignment {
  id: string
  tags: readonly string[]
}

/**
 * Options for the tag mapping lookup
 */
export interface FetchTagMappingOptions {
  timeoutMs?: number
  logger?: Logger
  signal?: AbortSignal
}

/**
 * Splits a comma-separated tag cell into distinct tag names.
 *
 * @example
 * ```typescript
 * parseTags('Donor, VIP, Donor') // ['Donor', 'VIP']
 * parseTags(' , ,')              // []
 * ```
 */
export function parseTags(raw: CellValue): string[] {
  return uniqueInOrder(
    cleanString(raw)
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
  )
}

/**
 * Builds an immutable mapping from service pairs.
 * Pairs with a blank side are skipped; the first pair for a name wins.
 */
export function buildTagMapping(pairs: readonly TagMappingPair[]): TagMapping {
  const mapping = new Map<string, string>()
  for (const pair of pairs) {
    const name = cleanString(pair.name)
    const mappedName = cleanString(pair.mappedName)
    if (!name || !mappedName || mapping.has(name)) continue
    mapping.set(name, mappedName)
  }
  return mapping
}

/**
 * Replaces each tag with its mapped name.
 *
 * Unmapped tags are kept as they are. Several originals may collapse onto one
 * mapped name, so the result is deduplicated again in first-seen order.
 *
 * @example
 * ```typescript
 * applyMapping(['Donor', 'VIP'], new Map([['VIP', 'Major Donor']]))
 * // ['Donor', 'Major Donor']
 * ```
 */
export function applyMapping(tags: readonly string[], mapping: TagMapping): string[] {
  return uniqueInOrder(
    tags
      .map((tag) => cleanString(mapping.get(tag) ?? tag))
      .filter((tag) => tag.length > 0)
  )
}

/**
 * Formats mapped tags for the output cell: sorted, comma-joined.
 */
export function formatTags(tags: readonly string[]): string {
  return [...tags].sort(compareTagNames).join(', ')
}

function compareTagNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Counts distinct constituents per mapped tag, sorted by tag name.
 */
export function countTags(assignments: readonly TagAssignment[]): TagCountRow[] {
  const holders = new Map<string, Set<string>>()

  for (const { id, tags } of assignments) {
    for (const tag of tags) {
      const name = cleanString(tag)
      if (!name) continue
      const ids = holders.get(name) ?? new Set<string>()
      ids.add(id)
      holders.set(name, ids)
    }
  }

  return Array.from(holders.keys())
    .sort(compareTagNames)
    .map((name) => ({ 'Tag Name': name, 'Tag Count': holders.get(name)?.size ?? 0 }))
}

/**
 * Fetches the tag mapping once, absorbing every failure.
 *
 * A missing service, a timeout, a network or HTTP error and a malformed
 * payload all produce an unsuccessful result with an empty mapping, so
 * callers can always proceed with the identity mapping.
 */
export async function fetchTagMapping(
  service: TagMappingService | undefined,
  options: FetchTagMappingOptions = {}
): Promise<ServiceResult<TagMapping>> {
  const { timeoutMs = DEFAULT_TAG_MAPPING_TIMEOUT_MS, logger, signal } = options
  const startedAt = new Date()
  const timing = () => {
    const completedAt = new Date()
    return {
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    }
  }

  if (!service) {
    logger?.warn('No tag mapping service configured; using identity mapping')
    return {
      success: false,
      data: new Map(),
      error: {
        code: 'SERVICE_NOT_CONFIGURED',
        message: 'No tag mapping service configured',
        type: 'unavailable',
        retryable: false,
      },
      timing: timing(),
    }
  }

  try {
    const pairs = await withAbortableTimeout(
      (abortSignal) => service.fetchMappings(abortSignal),
      { timeoutMs, serviceName: service.name, signal }
    )
    const mapping = buildTagMapping(pairs)
    logger?.debug(`Fetched ${mapping.size} tag mappings`, { service: service.name })
    return { success: true, data: mapping, timing: timing() }
  } catch (error) {
    const info = toServiceErrorInfo(error, service.name)
    logger?.warn('Tag mapping lookup failed; using identity mapping', {
      service: service.name,
      code: info.code,
      error: info.message,
    })
    return { success: false, data: new Map(), error: info, timing: timing() }
  }
}
