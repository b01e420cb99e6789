/**
 * Search Command
 *
 * Runs one QIDO-RS search and prints the records as JSON, with volatile
 * tags removed unless --raw is given.
 *
 * @module @dicom-it/cli/commands/search
 */

import {
  type SearchParams,
  type SearchType,
  ConfigurationError,
  SEARCH_TYPES,
  UpstreamError,
  createNormalizer,
  storeCoordinates,
} from '@dicom-it/core';
import { type CliContext, openHarness } from '../context.js';

export interface SearchOptions {
  type?: string;
  param?: string[];
  raw?: boolean;
}

const NUMERIC_PARAMS = new Set(['limit', 'offset']);

function isSearchType(value: string): value is SearchType {
  return SEARCH_TYPES.some((type) => type === value);
}

/**
 * Parse repeated `key=value` arguments. `limit` and `offset` must be
 * non-negative integers.
 */
export function parseSearchParams(pairs: readonly string[]): SearchParams {
  const params: SearchParams = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new ConfigurationError(`Invalid search parameter "${pair}" (expected key=value)`, [
        { field: 'param', message: 'Expected key=value' },
      ]);
    }

    const key = pair.slice(0, separator);
    const value = pair.slice(separator + 1);
    if (NUMERIC_PARAMS.has(key)) {
      if (!/^\d+$/.test(value)) {
        throw new ConfigurationError(`Search parameter ${key} must be a non-negative integer`, [
          { field: key, message: 'Expected a non-negative integer' },
        ]);
      }
      params[key] = Number(value);
    } else {
      params[key] = value;
    }
  }
  return params;
}

export async function searchCommand(
  storeId: string,
  options: SearchOptions,
  context: CliContext = {}
): Promise<void> {
  const searchType = options.type ?? 'instances';
  if (!isSearchType(searchType)) {
    throw new ConfigurationError(`Unknown search type "${searchType}" (expected ${SEARCH_TYPES.join(', ')})`, [
      { field: 'type', message: 'Invalid value' },
    ]);
  }

  const harness = openHarness(context);
  const pairs = options.param ?? [];
  const response = await harness.dicomWeb.search({
    ...storeCoordinates(harness.config),
    storeId,
    searchType,
    ...(pairs.length > 0 ? { params: parseSearchParams(pairs) } : {}),
  });

  if (response.status !== 200 && response.status !== 204) {
    throw new UpstreamError(`Search of ${storeId} failed: HTTP ${response.status}`, response.status, '');
  }

  const records = options.raw
    ? response.records
    : createNormalizer(harness.config.volatileTags).records(response.records);
  console.log(JSON.stringify(records, null, 2));
}
