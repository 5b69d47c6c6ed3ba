/**
 * 드라이버 파일명 유틸리티 테스트
 */

import { describe, it, expect } from 'vitest';
import {
  filenameFromUrl,
  sanitizeCategory,
  urlHasExtension,
} from './filename-utils';

describe('filename-utils', () => {
  describe('filenameFromUrl', () => {
    it('쿼리 문자열을 제외한 마지막 세그먼트 반환', () => {
      expect(filenameFromUrl('https://host/path/bios_1.2.exe?sig=abc')).toBe('bios_1.2.exe');
    });

    it('프래그먼트 제거', () => {
      expect(filenameFromUrl('https://host/path/n1cuj21w.txt#readme')).toBe('n1cuj21w.txt');
    });

    it('퍼센트 인코딩 디코딩', () => {
      expect(filenameFromUrl('https://host/a/Intel%20WLAN%20Driver.exe')).toBe('Intel WLAN Driver.exe');
      expect(filenameFromUrl('https://host/a/%ED%95%9C%EA%B8%80.zip')).toBe('한글.zip');
    });

    it('디코딩 결과의 경로 구분자는 밑줄로 치환', () => {
      expect(filenameFromUrl('https://host/a/evil%2F..%2Fname.exe')).toBe('evil_.._name.exe');
    });

    it('잘못된 퍼센트 시퀀스는 원문 유지', () => {
      expect(filenameFromUrl('https://host/a/100%25done%zz.exe')).toBe('100%25done%zz.exe');
    });

    it('URL이 아닌 값도 마지막 세그먼트 처리', () => {
      expect(filenameFromUrl('downloads/pkg/r1.exe?x=1')).toBe('r1.exe');
    });

    it('파일명이 없으면 에러', () => {
      expect(() => filenameFromUrl('https://host/path/')).toThrow('URL에서 파일명을 추출할 수 없습니다');
    });
  });

  describe('sanitizeCategory', () => {
    it('슬래시와 백슬래시를 하이픈으로 치환', () => {
      expect(sanitizeCategory('Audio/Video')).toBe('Audio-Video');
      expect(sanitizeCategory('Mouse\\Keyboard')).toBe('Mouse-Keyboard');
    });

    it('구분자가 없으면 그대로', () => {
      expect(sanitizeCategory('BIOS')).toBe('BIOS');
    });
  });

  describe('urlHasExtension', () => {
    it('대소문자와 쿼리를 무시', () => {
      expect(urlHasExtension('https://host/p/PKG.EXE?token=1', '.exe')).toBe(true);
      expect(urlHasExtension('https://host/p/readme.txt', '.exe')).toBe(false);
    });
  });
});
