import { ConfigurationError } from '../common/errors/enricher.errors';
import { parseCliOptions } from './enrich-cli.options';

describe('parseCliOptions', () => {
  it('인자가 없으면 기본 경로를 사용', () => {
    const options = parseCliOptions([]);
    expect(options.input).toBe('Game_Thumbnail.csv');
    expect(options.output).toBe('Game_Thumbnail_New.csv');
    expect(options.delayMs).toBeUndefined();
    expect(options.limit).toBeUndefined();
  });

  it('--key value / --key=value 형식을 모두 지원', () => {
    const options = parseCliOptions([
      '--input',
      'in.csv',
      '--output=out/result.csv',
      '--delay-ms=250',
      '--limit',
      '3',
      '--model',
      'gemini-1.5-pro',
      '--api-key=test-secret',
    ]);
    expect(options.input).toBe('in.csv');
    expect(options.output).toBe('out/result.csv');
    expect(options.delayMs).toBe(250);
    expect(options.limit).toBe(3);
    expect(options.model).toBe('gemini-1.5-pro');
    expect(options.apiKey).toBe('test-secret');
  });

  it('알 수 없는 옵션은 ConfigurationError', () => {
    expect(() => parseCliOptions(['--verbose'])).toThrow(ConfigurationError);
  });

  it('값이 빠진 옵션은 ConfigurationError', () => {
    expect(() => parseCliOptions(['--input'])).toThrow(
      '--input 옵션에 값이 필요합니다',
    );
    expect(() => parseCliOptions(['--input', '--limit', '2'])).toThrow(
      ConfigurationError,
    );
  });

  it('음수 딜레이나 0 limit은 검증 실패', () => {
    expect(() => parseCliOptions(['--delay-ms', '-1'])).toThrow(
      'delay-ms는 0 이상이어야 합니다',
    );
    expect(() => parseCliOptions(['--limit', '0'])).toThrow(
      'limit은 최소 1 이상이어야 합니다',
    );
    expect(() => parseCliOptions(['--limit', 'abc'])).toThrow(
      'limit은 정수여야 합니다',
    );
  });
});
