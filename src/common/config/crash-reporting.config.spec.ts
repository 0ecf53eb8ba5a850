import { describe, it, expect } from 'vitest';
import { loadCrashReportingConfig } from './crash-reporting.config';

describe('loadCrashReportingConfig', () => {
  it('should read endpoint and board id', () => {
    const config = loadCrashReportingConfig({
      RUNTIME_ERROR_ENDPOINT_URL: 'https://telemetry.test/errors',
      BOARD_ID: 'board-1',
    });

    expect(config).toEqual({
      endpointUrl: 'https://telemetry.test/errors',
      boardId: 'board-1',
    });
  });

  it('should treat empty and blank values as unset', () => {
    const config = loadCrashReportingConfig({
      RUNTIME_ERROR_ENDPOINT_URL: '',
      BOARD_ID: '   ',
    });

    expect(config.endpointUrl).toBeUndefined();
    expect(config.boardId).toBeUndefined();
  });

  it('should return a frozen object', () => {
    const config = loadCrashReportingConfig({});

    expect(Object.isFrozen(config)).toBe(true);
  });
});
