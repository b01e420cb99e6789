/**
 * Search work unit
 *
 * @module @dicom-it/engine/units
 */

import type { SearchRequest, SearchResult } from '@dicom-it/core';
import type { DicomSearcher } from '@dicom-it/connectors';
import type { WorkUnit } from '../executor/types.js';

/**
 * Maps one SearchRequest to one SearchResult. `input` is the request itself.
 */
export function searchUnit(searcher: DicomSearcher): WorkUnit<SearchRequest, SearchResult> {
  return async (request, context) => {
    const response = await searcher.search(request);
    context.logger.debug('Search finished', {
      storeId: request.storeId,
      searchType: request.searchType,
      status: response.status,
      count: response.records.length,
    });
    return {
      result: response.records,
      status: response.status,
      input: request,
      success: response.status === 200,
    };
  };
}
