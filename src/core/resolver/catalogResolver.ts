import axios, { AxiosInstance } from 'axios';
import type { DriverRecord, ProductDescriptor } from '../../types';
import type { ClientConfig } from '../config';
import { CatalogFetchDegradedError, ProductNotFoundError, describeError } from '../errors';
import logger from '../../utils/logger';
import type { DriverListResponse, DriverListVariant } from '../shared/catalog-types';
import {
  extractProductIdFromHtml,
  extractV2Items,
  extractV4Items,
  normalizeDriverList,
  normalizeProductResponse,
} from '../shared/catalog-normalize';

// 드라이버 목록 조회 결과
export interface DriverListResult {
  drivers: DriverRecord[];
  /** 결과를 만든 응답 변형, 모두 실패하면 null */
  variant: DriverListVariant | null;
  /** 대체 경로 사용 등 치명적이지 않은 경고 */
  warnings: CatalogFetchDegradedError[];
}

/**
 * Lenovo 지원 사이트 카탈로그 조회기
 *
 * 제품 조회: getproducts API → 제품 페이지 HTML에서 productId 추출 후 재조회
 * 드라이버 목록: v4 downloads API → v2 products/{id}/downloads
 */
export class CatalogResolver {
  private client: AxiosInstance;

  constructor(private readonly clientConfig: ClientConfig) {
    this.client = axios.create({
      baseURL: clientConfig.baseUrl,
      timeout: clientConfig.requestTimeoutMs,
      headers: { ...clientConfig.headers },
      // 상태 코드는 직접 판단
      validateStatus: () => true,
    });
  }

  /**
   * 시리얼 번호 정규화 (공백 제거, 대문자)
   */
  static normalizeIdentifier(identifier: string): string {
    return identifier.trim().toUpperCase();
  }

  /**
   * 시리얼 번호로 제품 조회
   */
  async resolve(identifier: string): Promise<ProductDescriptor> {
    const serial = CatalogResolver.normalizeIdentifier(identifier);
    logger.info('제품 조회 시작', { serial });

    try {
      const product = await this.queryProducts(serial);
      if (product) {
        logger.info('제품 조회 성공', { serial, id: product.id, name: product.name });
        return product;
      }
      logger.warn('기본 제품 API 결과 없음', { serial });
    } catch (error) {
      logger.warn('기본 제품 API 조회 실패', { serial, error: describeError(error) });
    }

    try {
      const html = await this.fetchText(`/products/${serial.toLowerCase()}`);
      const productId = extractProductIdFromHtml(html);
      if (productId) {
        const product = await this.queryProducts(productId);
        if (product) {
          logger.info('제품 페이지 경유 조회 성공', { serial, id: product.id, name: product.name });
          return product;
        }
      } else {
        logger.warn('제품 페이지에서 productId를 찾지 못함', { serial });
      }
    } catch (error) {
      logger.warn('제품 페이지 조회 실패', { serial, error: describeError(error) });
    }

    throw new ProductNotFoundError(serial);
  }

  /**
   * 제품의 드라이버 목록 조회
   * 레코드는 다운로드 가능한 파일이 하나 이상인 것만 포함된다.
   */
  async listDrivers(product: ProductDescriptor): Promise<DriverListResult> {
    const warnings: CatalogFetchDegradedError[] = [];
    const degrade = (endpoint: string, message: string): void => {
      const warning = new CatalogFetchDegradedError(endpoint, message);
      logger.warn(message, { endpoint, productId: product.id });
      warnings.push(warning);
    };

    const v4Endpoint = '/api/v4/downloads/drivers';
    try {
      const body = await this.fetchJson(v4Endpoint, { productId: product.id });
      const items = extractV4Items(body);
      if (items.length > 0) {
        const drivers = this.normalize({ variant: 'v4', items });
        if (drivers.length === 0) {
          degrade(v4Endpoint, '다운로드 가능한 파일이 있는 드라이버가 없습니다');
        }
        return { drivers, variant: 'v4', warnings };
      }
      degrade(v4Endpoint, 'v4 드라이버 목록이 비어 있어 v2 API로 재시도합니다');
    } catch (error) {
      degrade(v4Endpoint, `v4 드라이버 목록 조회 실패: ${describeError(error)}`);
    }

    const v2Endpoint = `/api/v2/products/${product.id}/downloads`;
    try {
      const body = await this.fetchJson(v2Endpoint);
      const drivers = this.normalize({ variant: 'v2', items: extractV2Items(body) });
      if (drivers.length === 0) {
        degrade(v2Endpoint, 'v2 API에서도 드라이버를 찾지 못했습니다');
      }
      return { drivers, variant: 'v2', warnings };
    } catch (error) {
      degrade(v2Endpoint, `v2 드라이버 목록 조회 실패: ${describeError(error)}`);
    }

    return { drivers: [], variant: null, warnings };
  }

  private normalize(response: DriverListResponse): DriverRecord[] {
    const drivers = normalizeDriverList(response);
    logger.info('드라이버 목록 정규화 완료', {
      variant: response.variant,
      items: response.items.length,
      drivers: drivers.length,
    });
    return drivers;
  }

  private async queryProducts(productId: string): Promise<ProductDescriptor | null> {
    const body = await this.fetchJson('/api/v4/mse/getproducts', { productId });
    return normalizeProductResponse(body, productId);
  }

  private async fetchJson(url: string, params?: Record<string, string>): Promise<unknown> {
    const response = await this.client.get<unknown>(url, { params });
    this.assertOk(url, response.status);
    return response.data;
  }

  private async fetchText(url: string): Promise<string> {
    const response = await this.client.get<unknown>(url, { responseType: 'text' });
    this.assertOk(url, response.status);
    return typeof response.data === 'string' ? response.data : '';
  }

  private assertOk(url: string, status: number): void {
    if (status < 200 || status >= 300) {
      throw new Error(`HTTP ${status}: ${this.clientConfig.baseUrl}${url}`);
    }
  }
}
