import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import type { DriverRecord, ProductDescriptor } from '../../types';
import { MANIFEST_FILENAME, createManifest, formatManifestDate, writeManifest } from './manifestWriter';
import { createTempDir } from '../../test-utils/fakeStreamSource';

const product: ProductDescriptor = {
  id: 'THINKPAD-T14-GEN-3/21AH',
  name: 'ThinkPad T14 Gen 3',
  raw: { Id: 'THINKPAD-T14-GEN-3/21AH', Name: 'ThinkPad T14 Gen 3', Type: 'Product.MachineType' },
};

const drivers: DriverRecord[] = [
  {
    title: 'BIOS Update',
    category: 'BIOS',
    version: '1.2',
    releaseDate: '',
    files: [{ url: 'https://host/path/bios_1.2.exe?sig=abc', size: '20.1 MB', name: 'BIOS Update' }],
  },
];

describe('formatManifestDate', () => {
  it('로컬 시간을 0으로 채워 포맷', () => {
    expect(formatManifestDate(new Date(2024, 0, 5, 9, 3, 7))).toBe('2024-01-05 09:03:07');
  });
});

describe('createManifest', () => {
  it('제품 원본 레코드와 전체 드라이버 목록 포함', () => {
    const manifest = createManifest({
      serialNumber: 'PF1234AB',
      product,
      drivers,
      date: new Date(2024, 11, 31, 23, 59, 0),
    });

    expect(manifest).toEqual({
      serial_number: 'PF1234AB',
      product: product.raw,
      drivers,
      download_date: '2024-12-31 23:59:00',
    });
  });
});

describe('writeManifest', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = path.join(createTempDir('manifest-test'), 'drivers_PF1234AB');
  });

  afterEach(async () => {
    await fs.remove(path.dirname(outputDir));
  });

  it('출력 디렉토리를 만들고 들여쓰기 2칸 JSON으로 기록', async () => {
    const manifestPath = await writeManifest(outputDir, {
      serialNumber: 'PF1234AB',
      product,
      drivers,
      date: new Date(2024, 0, 1, 0, 0, 0),
    });

    expect(manifestPath).toBe(path.join(outputDir, MANIFEST_FILENAME));
    const content = fs.readFileSync(manifestPath, 'utf-8');
    expect(content).toContain('\n  "serial_number": "PF1234AB",');
    expect(JSON.parse(content)).toMatchObject({
      download_date: '2024-01-01 00:00:00',
      drivers: [{ title: 'BIOS Update' }],
    });
  });
});
