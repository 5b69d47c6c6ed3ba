/**
 * CatalogResolver 단위 테스트
 *
 * axios를 모킹하여 네트워크 호출 없이 조회/대체 경로를 검증합니다.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import axios from 'axios';
import { CatalogResolver } from './catalogResolver';
import { createClientConfig } from '../config';
import { ProductNotFoundError } from '../errors';
import type { ProductDescriptor } from '../../types';

// axios 모킹
vi.mock('axios');
const mockedAxios = vi.mocked(axios, true);

// mock axios client
const mockGet = vi.fn();
const mockClient = { get: mockGet };

const productRecord = {
  Id: 'LAPTOPS-AND-NETBOOKS/THINKPAD-T-SERIES-LAPTOPS/THINKPAD-T14-GEN-3/21AH',
  Name: 'ThinkPad T14 Gen 3',
};

const product: ProductDescriptor = {
  id: 'LAPTOPS-AND-NETBOOKS/THINKPAD-T-SERIES-LAPTOPS/THINKPAD-T14-GEN-3/21AH',
  name: 'ThinkPad T14 Gen 3',
  raw: {},
};

const biosItem = {
  Title: 'BIOS Update',
  Category: { Name: 'BIOS' },
  Version: '1.2',
  Date: { Unix: 1700000000000 },
  Files: [
    { Name: 'BIOS Update (Utility & Bootable CD)', URL: 'https://download.example.test/bios_1.2.exe', Size: '20.1 MB', SHA256: 'aa11' },
    { Name: 'README', URL: '' },
  ],
};

const emptyFilesItem = {
  Title: 'Knowledge Base Article',
  Category: { Name: 'Other' },
  Files: [],
};

const createResolver = () => new CatalogResolver(createClientConfig());

describe('CatalogResolver', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockGet.mockReset();
    mockedAxios.create.mockReturnValue(mockClient as never);
  });

  it('ClientConfig로 axios 인스턴스 생성', () => {
    createResolver();

    expect(mockedAxios.create).toHaveBeenCalledWith(
      expect.objectContaining({
        baseURL: 'https://pcsupport.lenovo.com/us/en',
        timeout: 30000,
      })
    );
  });

  describe('resolve', () => {
    it('기본 API에서 첫 번째 제품 반환', async () => {
      mockGet.mockResolvedValueOnce({ status: 200, data: [productRecord] });

      const result = await createResolver().resolve('  pf1234ab ');

      expect(result.id).toBe(productRecord.Id);
      expect(result.name).toBe('ThinkPad T14 Gen 3');
      expect(mockGet).toHaveBeenCalledTimes(1);
      expect(mockGet).toHaveBeenCalledWith('/api/v4/mse/getproducts', {
        params: { productId: 'PF1234AB' },
      });
    });

    it('기본 API 결과가 비면 제품 페이지에서 productId를 추출해 재조회', async () => {
      mockGet
        .mockResolvedValueOnce({ status: 200, data: [] })
        .mockResolvedValueOnce({
          status: 200,
          data: '<script>window.ds = {"productId": "THINKPAD-T14-GEN-3/21AH"};</script>',
        })
        .mockResolvedValueOnce({ status: 200, data: [{ Id: 'THINKPAD-T14-GEN-3/21AH', Name: 'T14' }] });

      const result = await createResolver().resolve('PF1234AB');

      expect(result.id).toBe('THINKPAD-T14-GEN-3/21AH');
      expect(mockGet).toHaveBeenNthCalledWith(2, '/products/pf1234ab', { responseType: 'text' });
      expect(mockGet).toHaveBeenNthCalledWith(3, '/api/v4/mse/getproducts', {
        params: { productId: 'THINKPAD-T14-GEN-3/21AH' },
      });
    });

    it('기본 API가 네트워크 에러를 내도 대체 경로 시도', async () => {
      mockGet
        .mockRejectedValueOnce(new Error('ECONNRESET'))
        .mockResolvedValueOnce({ status: 200, data: '"productId": "ABC"' })
        .mockResolvedValueOnce({ status: 200, data: [{ Id: 'ABC', Name: 'ThinkCentre' }] });

      const result = await createResolver().resolve('PF1234AB');

      expect(result.name).toBe('ThinkCentre');
    });

    it('Id가 없으면 조회에 쓴 ID 사용', async () => {
      mockGet.mockResolvedValueOnce({ status: 200, data: [{ Name: 'Unnamed' }] });

      const result = await createResolver().resolve('PF1234AB');

      expect(result.id).toBe('PF1234AB');
    });

    it('모든 전략 실패 시 ProductNotFoundError', async () => {
      mockGet.mockResolvedValue({ status: 404, data: 'not found' });

      const error = await createResolver().resolve('pf0000').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProductNotFoundError);
      expect(error).toMatchObject({ identifier: 'PF0000', code: 'PRODUCT_NOT_FOUND' });
    });

    it('HTML에 productId가 없으면 재조회하지 않음', async () => {
      mockGet
        .mockResolvedValueOnce({ status: 500, data: '' })
        .mockResolvedValueOnce({ status: 200, data: '<html></html>' });

      await expect(createResolver().resolve('PF1234AB')).rejects.toBeInstanceOf(ProductNotFoundError);
      expect(mockGet).toHaveBeenCalledTimes(2);
    });
  });

  describe('listDrivers', () => {
    it('v4 body.DownloadItems 정규화 및 빈 파일 레코드 제외', async () => {
      mockGet.mockResolvedValueOnce({
        status: 200,
        data: { body: { DownloadItems: [biosItem, emptyFilesItem] } },
      });

      const result = await createResolver().listDrivers(product);

      expect(result.variant).toBe('v4');
      expect(result.warnings).toHaveLength(0);
      expect(result.drivers).toEqual([
        {
          title: 'BIOS Update',
          category: 'BIOS',
          version: '1.2',
          releaseDate: '1700000000000',
          files: [
            {
              url: 'https://download.example.test/bios_1.2.exe',
              size: '20.1 MB',
              name: 'BIOS Update (Utility & Bootable CD)',
              sha256: 'aa11',
            },
          ],
        },
      ]);
      expect(mockGet).toHaveBeenCalledWith('/api/v4/downloads/drivers', {
        params: { productId: product.id },
      });
    });

    it('최상위 DownloadItems도 인식', async () => {
      mockGet.mockResolvedValueOnce({ status: 200, data: { DownloadItems: [biosItem] } });

      const result = await createResolver().listDrivers(product);

      expect(result.drivers).toHaveLength(1);
      expect(result.variant).toBe('v4');
    });

    it('v4 목록이 비면 v2로 재시도하고 경고 기록', async () => {
      const v2Item = {
        Name: 'Intel Wireless LAN Driver',
        Category: 'Networking: Wireless LAN',
        Version: '22.200',
        DownloadUrl: 'https://download.example.test/wlan/n3ww.exe?x=1',
        Size: 1024,
      };
      mockGet
        .mockResolvedValueOnce({ status: 200, data: { body: {} } })
        .mockResolvedValueOnce({ status: 200, data: { Downloads: [v2Item, { Name: 'no url' }] } });

      const result = await createResolver().listDrivers(product);

      expect(result.variant).toBe('v2');
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0].code).toBe('CATALOG_FETCH_DEGRADED');
      expect(result.drivers).toEqual([
        {
          title: 'Intel Wireless LAN Driver',
          category: 'Networking: Wireless LAN',
          version: '22.200',
          releaseDate: '',
          files: [{ url: 'https://download.example.test/wlan/n3ww.exe?x=1', size: 1024, name: 'n3ww.exe' }],
        },
      ]);
      expect(mockGet).toHaveBeenNthCalledWith(2, `/api/v2/products/${product.id}/downloads`, {
        params: undefined,
      });
    });

    it('두 API 모두 실패하면 빈 목록과 경고 반환', async () => {
      mockGet
        .mockRejectedValueOnce(new Error('timeout of 30000ms exceeded'))
        .mockResolvedValueOnce({ status: 503, data: '' });

      const result = await createResolver().listDrivers(product);

      expect(result.drivers).toEqual([]);
      expect(result.variant).toBeNull();
      expect(result.warnings).toHaveLength(2);
      expect(result.warnings[0].message).toBe('v4 드라이버 목록 조회 실패: timeout of 30000ms exceeded');
    });
  });
});
