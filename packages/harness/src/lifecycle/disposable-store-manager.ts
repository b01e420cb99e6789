/**
 * Disposable Store Manager
 *
 * Creates a uniquely named DICOM store per scenario and guarantees exactly
 * one delete for it, whether the scenario body passes, throws or fails an
 * assertion. Nothing is retried.
 *
 * @module @dicom-it/harness/lifecycle
 */

import {
  type DisposableStore,
  type ILogger,
  type ResourceIdOptions,
  type StoreCoordinates,
  NoOpLogger,
  createResourceId,
  errorMessage,
} from '@dicom-it/core';
import type { StoreAdmin } from '@dicom-it/connectors';

export interface DisposableStoreManagerOptions {
  /** Prefix of every generated store id */
  storePrefix: string;
  naming?: ResourceIdOptions;
  logger?: ILogger;
}

export class DisposableStoreManager {
  private readonly active = new Map<string, DisposableStore>();
  private readonly logger: ILogger;

  constructor(
    private readonly admin: StoreAdmin,
    private readonly options: DisposableStoreManagerOptions
  ) {
    this.logger = (options.logger ?? new NoOpLogger()).child({ component: 'lifecycle' });
  }

  /**
   * Stores acquired and not yet released
   */
  get activeStores(): readonly DisposableStore[] {
    return [...this.active.values()];
  }

  /**
   * @throws {ResourceCreationError} On a non-2xx status
   */
  create(coordinates: StoreCoordinates, storeId: string): Promise<number> {
    return this.admin.createStore(coordinates, storeId);
  }

  /**
   * @throws {ResourceDeletionError} On a non-2xx status
   */
  delete(coordinates: StoreCoordinates, storeId: string): Promise<number> {
    return this.admin.deleteStore(coordinates, storeId);
  }

  /**
   * Create a fresh store and track it until release
   */
  async acquire(coordinates: StoreCoordinates): Promise<DisposableStore> {
    const storeId = createResourceId(this.options.storePrefix, this.options.naming);
    await this.create(coordinates, storeId);

    const store: DisposableStore = { coordinates, storeId, createdAt: new Date() };
    this.active.set(storeId, store);
    this.logger.info('DICOM store created', { storeId });
    return store;
  }

  /**
   * Delete an acquired store. Returns false, without calling the API, when
   * the store was already released or never acquired here.
   */
  async release(store: DisposableStore): Promise<boolean> {
    if (!this.active.delete(store.storeId)) {
      return false;
    }
    await this.delete(store.coordinates, store.storeId);
    this.logger.info('DICOM store deleted', { storeId: store.storeId });
    return true;
  }

  /**
   * Release every tracked store, attempting each one once. The first
   * deletion error is rethrown after all attempts.
   */
  async releaseAll(): Promise<void> {
    const failures: unknown[] = [];
    for (const store of this.activeStores) {
      try {
        await this.release(store);
      } catch (error) {
        this.logger.error('DICOM store deletion failed', { storeId: store.storeId, error: errorMessage(error) });
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      throw failures[0];
    }
  }

  /**
   * Scoped acquisition: create, run `body`, delete.
   *
   * When `body` throws, a deletion failure is logged and the body's error
   * is the one that surfaces.
   */
  async use<T>(coordinates: StoreCoordinates, body: (store: DisposableStore) => Promise<T>): Promise<T> {
    const store = await this.acquire(coordinates);

    let result: T;
    try {
      result = await body(store);
    } catch (error) {
      try {
        await this.release(store);
      } catch (teardownError) {
        this.logger.error('Teardown failed after scenario failure', {
          storeId: store.storeId,
          error: errorMessage(teardownError),
        });
      }
      throw error;
    }

    await this.release(store);
    return result;
  }
}
