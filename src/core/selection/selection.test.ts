/**
 * 선택 계층 단위 테스트
 */

import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import type { DriverRecord, SccmPackage } from '../../types';
import { InvalidSelectionError } from '../errors';
import {
  filterByCategories,
  summarizeCategories,
  getSccmPackages,
  parseSelectionInput,
  validatePresetIndices,
  PresetSelectionProvider,
  InteractiveSelectionProvider,
} from './index';

const driver = (title: string, category: string, urls: string[]): DriverRecord => ({
  title,
  category,
  version: '1.0',
  releaseDate: '',
  files: urls.map((url) => ({ url, size: 0, name: title })),
});

const drivers: DriverRecord[] = [
  driver('BIOS Update', 'BIOS', ['https://h/bios.exe']),
  driver('Realtek Audio Driver', 'Audio', ['https://h/audio.exe', 'https://h/audio.txt']),
  driver('SCCM Package for Windows 11', 'Software and Utilities', [
    'https://h/tp_t14_w11_64.exe?sig=1',
    'https://h/tp_t14_w11_64.txt',
  ]),
  driver('sccm package readme only', 'Software and Utilities', ['https://h/readme.html']),
  driver('Lenovo SCCM Driver Pack Windows 10', 'Software and Utilities', ['https://h/tp_t14_w10_64.EXE']),
];

const fivePackages: SccmPackage[] = Array.from({ length: 5 }, (_, i) => ({
  title: `SCCM ${i + 1}`,
  category: 'Software and Utilities',
  files: [{ url: `https://h/p${i + 1}.exe`, size: 0, name: '' }],
}));

describe('filterByCategories', () => {
  it('대소문자 무시 완전 일치', () => {
    const result = filterByCategories(drivers, ['bios', 'AUDIO']);

    expect(result.map((d) => d.title)).toEqual(['BIOS Update', 'Realtek Audio Driver']);
  });

  it('필터가 없으면 전체 반환', () => {
    expect(filterByCategories(drivers)).toHaveLength(5);
    expect(filterByCategories(drivers, [])).toHaveLength(5);
  });

  it('일치하는 것이 없으면 빈 배열', () => {
    expect(filterByCategories(drivers, ['Camera'])).toEqual([]);
  });

  it('부분 일치는 제외', () => {
    expect(filterByCategories(drivers, ['Software'])).toEqual([]);
  });
});

describe('summarizeCategories', () => {
  it('카테고리별 드라이버/파일 수를 이름순으로 집계', () => {
    expect(summarizeCategories(drivers)).toEqual([
      { category: 'Audio', drivers: 1, files: 2 },
      { category: 'BIOS', drivers: 1, files: 1 },
      { category: 'Software and Utilities', drivers: 3, files: 4 },
    ]);
  });
});

describe('getSccmPackages', () => {
  it('제목에 sccm이 있고 .exe 파일이 남는 레코드만 반환', () => {
    const packages = getSccmPackages(drivers);

    expect(packages.map((p) => p.title)).toEqual([
      'SCCM Package for Windows 11',
      'Lenovo SCCM Driver Pack Windows 10',
    ]);
    expect(packages[0].files.map((f) => f.url)).toEqual(['https://h/tp_t14_w11_64.exe?sig=1']);
    expect(packages[1].files.map((f) => f.url)).toEqual(['https://h/tp_t14_w10_64.EXE']);
  });

  it('SCCM 패키지가 없으면 빈 배열', () => {
    expect(getSccmPackages(drivers.slice(0, 2))).toEqual([]);
  });
});

describe('parseSelectionInput', () => {
  it('"1,3"은 0-based [0, 2]', () => {
    expect(parseSelectionInput('1,3', 5)).toEqual({ kind: 'selected', indices: [0, 2] });
  });

  it('공백, 중복, 순서 정리', () => {
    expect(parseSelectionInput(' 5, 2 ,2,', 5)).toEqual({ kind: 'selected', indices: [1, 4] });
  });

  it('"all"과 빈 입력은 전체', () => {
    expect(parseSelectionInput('ALL', 5)).toEqual({ kind: 'selected', indices: [0, 1, 2, 3, 4] });
    expect(parseSelectionInput('   ', 3)).toEqual({ kind: 'selected', indices: [0, 1, 2] });
  });

  it('"none"은 취소', () => {
    expect(parseSelectionInput('None', 5)).toEqual({ kind: 'cancelled' });
  });

  it('"0"과 "6"은 범위 밖', () => {
    expect(() => parseSelectionInput('0', 5)).toThrow(InvalidSelectionError);
    expect(() => parseSelectionInput('6', 5)).toThrow('잘못된 번호입니다: 6. 1부터 5 사이여야 합니다');
  });

  it('유효한 번호가 섞여 있어도 하나라도 잘못되면 전체 거부', () => {
    expect(() => parseSelectionInput('1,abc', 5)).toThrow('숫자가 아닌 입력입니다: abc');
    expect(() => parseSelectionInput('1,-2', 5)).toThrow(InvalidSelectionError);
  });

  it('번호가 하나도 없으면 거부', () => {
    expect(() => parseSelectionInput(',,', 5)).toThrow('선택된 패키지가 없습니다');
  });
});

describe('validatePresetIndices', () => {
  it('1-based 번호를 0-based로 변환', () => {
    expect(validatePresetIndices([3, 1, 3], 5)).toEqual([0, 2]);
  });

  it('범위 밖 번호는 바로 에러', () => {
    expect(() => validatePresetIndices([1, 6], 5)).toThrow(InvalidSelectionError);
    expect(() => validatePresetIndices([0], 5)).toThrow(InvalidSelectionError);
  });

  it('정수가 아니면 에러', () => {
    expect(() => validatePresetIndices([1.5], 5)).toThrow('정수가 아닌 패키지 번호입니다: 1.5');
  });

  it('빈 목록은 에러', () => {
    expect(() => validatePresetIndices([], 5)).toThrow(InvalidSelectionError);
  });

  it('명령행 문자열은 입력한 토큰 그대로 검증', () => {
    expect(validatePresetIndices(['3', '1'], 5)).toEqual([0, 2]);

    let caught: unknown;
    try {
      validatePresetIndices(['2', 'abc'], 5);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidSelectionError);
    expect(caught).toMatchObject({ token: 'abc', message: '정수가 아닌 패키지 번호입니다: abc' });
  });
});

describe('PresetSelectionProvider', () => {
  it('미리 받은 번호로 선택', async () => {
    const provider = new PresetSelectionProvider([2, 4]);

    await expect(provider.select(fivePackages)).resolves.toEqual({ kind: 'selected', indices: [1, 3] });
  });

  it('범위 밖 번호는 거부', async () => {
    const provider = new PresetSelectionProvider([9]);

    await expect(provider.select(fivePackages)).rejects.toBeInstanceOf(InvalidSelectionError);
  });
});

describe('InteractiveSelectionProvider', () => {
  const createStreams = () => {
    const input = new PassThrough();
    const output = new PassThrough();
    let written = '';
    output.on('data', (chunk: Buffer) => {
      written += chunk.toString();
    });
    return { input, output, getOutput: () => written };
  };

  it('잘못된 입력 후 다시 물어 유효한 선택 반환', async () => {
    const { input, output, getOutput } = createStreams();
    const provider = new InteractiveSelectionProvider({ input, output });

    const pending = provider.select(fivePackages);
    input.write('abc\n');
    input.write('0\n');
    input.write('1,3\n');

    await expect(pending).resolves.toEqual({ kind: 'selected', indices: [0, 2] });
    expect(getOutput()).toContain('⚠ 숫자가 아닌 입력입니다: abc');
    expect(getOutput()).toContain('⚠ 잘못된 번호입니다: 0. 1부터 5 사이여야 합니다');
  });

  it('none 입력은 취소', async () => {
    const { input, output } = createStreams();
    const provider = new InteractiveSelectionProvider({ input, output });

    const pending = provider.select(fivePackages);
    input.write('none\n');

    await expect(pending).resolves.toEqual({ kind: 'cancelled' });
  });

  it('interrupt()는 열린 프롬프트를 닫고 취소로 끝냄', async () => {
    const { input, output } = createStreams();
    const provider = new InteractiveSelectionProvider({ input, output });

    const pending = provider.select(fivePackages);
    const interrupted = provider.interrupt();

    await expect(pending).resolves.toEqual({ kind: 'cancelled' });
    expect(interrupted).toBe(true);
    expect(provider.interrupt()).toBe(false);
  });

  it('입력 종료(EOF)는 취소', async () => {
    const { input, output } = createStreams();
    const provider = new InteractiveSelectionProvider({ input, output });

    const pending = provider.select(fivePackages);
    input.end();

    await expect(pending).resolves.toEqual({ kind: 'cancelled' });
  });
});
