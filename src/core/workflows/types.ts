import type { DriverRecord, ProductDescriptor } from '../../types';
import type { CatalogFetchDegradedError } from '../errors';
import type { CatalogResolver } from '../resolver/catalogResolver';

/** 워크플로가 쓰는 카탈로그 조회 부분 */
export type DriverCatalog = Pick<CatalogResolver, 'resolve' | 'listDrivers'>;

/** 카탈로그 조회 단계 공통 훅 */
export interface CatalogHooks {
  onProductResolved?: (product: ProductDescriptor) => void;
  onDriversListed?: (drivers: DriverRecord[], warnings: CatalogFetchDegradedError[]) => void;
  onManifestWritten?: (manifestPath: string) => void;
}
