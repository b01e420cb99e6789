/**
 * Upload work unit
 *
 * @module @dicom-it/engine/units
 */

import { errorMessage, type StoreCoordinates, type UploadOutcome } from '@dicom-it/core';
import type { DicomStorer, MatchedFile } from '@dicom-it/connectors';
import type { WorkUnit } from '../executor/types.js';

export interface UploadTarget {
  coordinates: StoreCoordinates;
  storeId: string;
}

/**
 * Maps one matched file to one UploadOutcome. Read or transport failures
 * become unsuccessful outcomes carrying the error message, so every file
 * is accounted for.
 */
export function uploadUnit(storer: DicomStorer, target: UploadTarget): WorkUnit<MatchedFile, UploadOutcome> {
  return async (file, context) => {
    try {
      const bytes = await file.read();
      const response = await storer.storeInstance(target.coordinates, target.storeId, bytes);
      return {
        success: response.status === 200,
        status: response.status,
        message: response.body,
        input: file.path,
      };
    } catch (error) {
      context.logger.warn('Upload failed', { file: file.path, error: errorMessage(error) });
      return {
        success: false,
        status: 0,
        message: errorMessage(error),
        input: file.path,
      };
    }
  };
}
