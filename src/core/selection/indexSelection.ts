import type { SelectionResult } from '../../types';
import { InvalidSelectionError } from '../errors';

/**
 * 사용자 입력을 0-based 인덱스로 변환
 *
 * - 'none' → 취소
 * - 'all' 또는 빈 입력 → 전체
 * - '1,3,5' → [0, 2, 4] (중복 제거, 오름차순)
 *
 * 범위를 벗어나거나 숫자가 아닌 토큰이 하나라도 있으면 입력 전체를 거부한다.
 */
export function parseSelectionInput(input: string, count: number): SelectionResult {
  const selection = input.trim().toLowerCase();

  if (selection === 'none') {
    return { kind: 'cancelled' };
  }
  if (selection === 'all' || selection === '') {
    return { kind: 'selected', indices: allIndices(count) };
  }

  const indices: number[] = [];
  for (const raw of selection.split(',')) {
    const token = raw.trim();
    if (!token) continue;

    if (!/^\d+$/.test(token)) {
      throw new InvalidSelectionError(token, `숫자가 아닌 입력입니다: ${token}`);
    }
    indices.push(toZeroBased(Number(token), count, token));
  }

  if (indices.length === 0) {
    throw new InvalidSelectionError(input, '선택된 패키지가 없습니다');
  }

  return { kind: 'selected', indices: uniqueSorted(indices) };
}

/**
 * 명령행으로 받은 1-based 인덱스 검증 및 변환
 * 비대화형 모드이므로 잘못된 값은 재입력 없이 바로 에러
 */
export function validatePresetIndices(indices: ReadonlyArray<number | string>, count: number): number[] {
  if (indices.length === 0) {
    throw new InvalidSelectionError('', '선택된 패키지가 없습니다');
  }

  return uniqueSorted(
    indices.map((raw) => {
      // 명령행 문자열은 사용자가 입력한 그대로 에러에 담는다
      const token = String(raw).trim();
      const isInteger = typeof raw === 'number' ? Number.isInteger(raw) : /^\d+$/.test(token);
      if (!isInteger) {
        throw new InvalidSelectionError(token, `정수가 아닌 패키지 번호입니다: ${token}`);
      }
      return toZeroBased(Number(token), count, token);
    })
  );
}

function toZeroBased(index: number, count: number, token: string): number {
  if (index < 1 || index > count) {
    throw new InvalidSelectionError(token, `잘못된 번호입니다: ${token}. 1부터 ${count} 사이여야 합니다`);
  }
  return index - 1;
}

function allIndices(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i);
}

function uniqueSorted(indices: number[]): number[] {
  return Array.from(new Set(indices)).sort((a, b) => a - b);
}
