import { err, ok } from '../../common/types/result';
import { AttributeKind } from '../attribute-kind';
import {
  normalizeDescription,
  normalizeGenre,
  normalizePlayerMode,
  resolveAttribute,
} from './response-normalizer.util';

describe('response-normalizer', () => {
  describe('🎯 normalizeGenre', () => {
    it('여러 토큰이면 첫 토큰만 반환', () => {
      expect(normalizeGenre('Strategy game.')).toBe('Strategy');
    });

    it('앞뒤 공백/개행 제거', () => {
      expect(normalizeGenre('  RPG\n')).toBe('RPG');
    });

    it('장르 목록에 없는 단일 토큰도 그대로 반환', () => {
      expect(normalizeGenre('Roguelike')).toBe('Roguelike');
    });

    it('탭/개행으로 구분된 토큰도 첫 토큰만', () => {
      expect(normalizeGenre('Action\tAdventure')).toBe('Action');
    });

    it('빈 문자열은 빈 문자열', () => {
      expect(normalizeGenre('   ')).toBe('');
    });
  });

  describe('📝 normalizeDescription', () => {
    const words = (n: number) =>
      Array.from({ length: n }, (_, i) => `w${i + 1}`).join(' ');

    it('30단어 이하는 trim만 적용', () => {
      const thirty = words(30);
      expect(normalizeDescription(`  ${thirty}  `)).toBe(thirty);
    });

    it('31단어면 29단어 + 마침표', () => {
      const result = normalizeDescription(words(31));
      expect(result).toBe(`${words(29)}.`);
      expect(result.split(' ')).toHaveLength(29);
    });

    it('잘라낼 때 여러 공백은 단일 공백으로 합쳐진다', () => {
      const spaced = words(40).replace(/ /g, '  \n ');
      expect(normalizeDescription(spaced)).toBe(`${words(29)}.`);
    });

    it('30단어 이하면 내부 공백은 그대로 유지', () => {
      expect(normalizeDescription('Fast   paced\nracing.')).toBe(
        'Fast   paced\nracing.',
      );
    });
  });

  describe('👥 normalizePlayerMode', () => {
    it.each([
      ['Singleplayer', 'Singleplayer'],
      ['Multiplayer', 'Multiplayer'],
      ['Both', 'Both'],
      ['single-player only', 'Singleplayer'],
      ['MULTIPLAYER', 'Multiplayer'],
      ['both modes', 'Both'],
      ['Both single and multi', 'Singleplayer'],
      ['multi and both', 'Both'],
      ['Co-op', 'Both'],
      ['', 'Both'],
    ])('%p → %p', (raw, expected) => {
      expect(normalizePlayerMode(raw)).toBe(expected);
    });

    it('single과 multi가 모두 있으면 single 규칙이 먼저 적용', () => {
      expect(
        normalizePlayerMode(
          'This game supports both single-player campaign and online multiplayer',
        ),
      ).toBe('Singleplayer');
    });
  });

  describe('🔁 resolveAttribute', () => {
    const failure = { reason: 'request-failed' as const, message: 'boom' };

    it('성공 결과는 정규화', () => {
      expect(resolveAttribute(AttributeKind.Genre, ok('Puzzle game'))).toBe(
        'Puzzle',
      );
    });

    it.each<[AttributeKind, string]>([
      [AttributeKind.Genre, 'Unknown'],
      [AttributeKind.Description, 'A video game experience.'],
      [AttributeKind.PlayerMode, 'Both'],
    ])('%s 실패 시 대체값 %p', (kind, expected) => {
      expect(resolveAttribute(kind, err(failure))).toBe(expected);
    });
  });
});
