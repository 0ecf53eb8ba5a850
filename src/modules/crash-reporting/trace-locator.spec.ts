import { describe, it, expect } from 'vitest';
import {
  isMachineryFrame,
  isRuntimeFrame,
  locateSourceFrame,
  parseStackFrames,
} from './trace-locator';

const RECOVERY_FRAMES = [
  '    at PanicRecoveryFilter.describe (/srv/board/dist/modules/crash-reporting/panic-recovery.filter.js:97:27)',
  '    at PanicRecoveryFilter.catch (/srv/board/dist/modules/crash-reporting/panic-recovery.filter.js:61:33)',
  '    at ExceptionsHandler.invokeCustomFilters (/srv/board/node_modules/@nestjs/core/exceptions/exceptions-handler.js:33:26)',
  '    at process.processTicksAndRejections (node:internal/process/task_queues:95:5)',
];

const APP_FRAME =
  '    at BoardService.divide (/srv/board/src/app.ts:42:11)';

function trace(...lines: string[]): string {
  return lines.join('\n');
}

describe('parseStackFrames', () => {
  it('should parse descriptor, path, line and column', () => {
    expect(parseStackFrames(APP_FRAME)).toEqual([
      {
        descriptor: 'BoardService.divide',
        path: '/srv/board/src/app.ts',
        line: 42,
        column: 11,
      },
    ]);
  });

  it('should parse anonymous frames without a descriptor', () => {
    expect(
      parseStackFrames('    at /srv/board/dist/main.js:12:5'),
    ).toEqual([
      { descriptor: '', path: '/srv/board/dist/main.js', line: 12, column: 5 },
    ]);
  });

  it('should skip error headers and unit headers', () => {
    const frames = parseStackFrames(
      trace('[failing]', 'Error: boom', APP_FRAME, '', '[recovering]'),
    );

    expect(frames).toHaveLength(1);
  });

  it('should strip the file:// scheme from module URLs', () => {
    const [frame] = parseStackFrames(
      '    at file:///srv/board/src/loader.mjs:7:3',
    );

    expect(frame?.path).toBe('/srv/board/src/loader.mjs');
  });
});

describe('frame classification', () => {
  it('should treat recovery pipeline frames as machinery', () => {
    const [frame] = parseStackFrames(RECOVERY_FRAMES[1] ?? '');

    expect(frame && isMachineryFrame(frame)).toBe(true);
  });

  it('should treat installed packages and node internals as runtime', () => {
    const frames = parseStackFrames(trace(...RECOVERY_FRAMES.slice(2)));

    expect(frames.map(isRuntimeFrame)).toEqual([true, true]);
  });

  it('should treat application frames as neither', () => {
    const [frame] = parseStackFrames(APP_FRAME);

    expect(frame && isMachineryFrame(frame)).toBe(false);
    expect(frame && isRuntimeFrame(frame)).toBe(false);
  });
});

describe('locateSourceFrame', () => {
  it('should skip leading machinery frames to reach app.ts:42', () => {
    const located = locateSourceFrame(
      trace(
        '[failing]',
        'Error: division by zero',
        RECOVERY_FRAMES[0] ?? '',
        RECOVERY_FRAMES[1] ?? '',
        APP_FRAME,
      ),
    );

    expect(located).toEqual({ file: 'app.ts', line: 42 });
  });

  it.each([0, 1, 4, 20])(
    'should find the origin after %i machinery frames',
    (count) => {
      const machinery = Array.from(
        { length: count },
        (_, i) => RECOVERY_FRAMES[i % RECOVERY_FRAMES.length] ?? '',
      );

      expect(locateSourceFrame(trace(...machinery, APP_FRAME))).toEqual({
        file: 'app.ts',
        line: 42,
      });
    },
  );

  it('should return undefined when only machinery and runtime frames exist', () => {
    expect(locateSourceFrame(trace(...RECOVERY_FRAMES))).toBeUndefined();
  });

  it('should return undefined for an empty trace', () => {
    expect(locateSourceFrame('')).toBeUndefined();
  });

  it('should skip frames from installed libraries', () => {
    const located = locateSourceFrame(
      trace(
        '    at Object.parse (/srv/board/node_modules/some-lib/index.js:10:3)',
        '    at Parser.run (/srv/board/src/parser.ts:8:14)',
      ),
    );

    expect(located).toEqual({ file: 'parser.ts', line: 8 });
  });

  it('should skip frames whose file is not source code', () => {
    const located = locateSourceFrame(
      trace(
        '    at render (/srv/board/views/index.hbs:3:1)',
        '    at View.render (/srv/board/src/view.ts:19:7)',
      ),
    );

    expect(located).toEqual({ file: 'view.ts', line: 19 });
  });

  it('should skip frames with a zero line number', () => {
    const located = locateSourceFrame(
      trace(
        '    at generated (/srv/board/src/generated.js:0:1)',
        APP_FRAME,
      ),
    );

    expect(located).toEqual({ file: 'app.ts', line: 42 });
  });

  it('should take the base name of Windows paths', () => {
    expect(
      locateSourceFrame('    at Handler.run (C:\\srv\\board\\src\\handler.ts:7:3)'),
    ).toEqual({ file: 'handler.ts', line: 7 });
  });

  it('should skip timer and microtask scheduling frames', () => {
    const located = locateSourceFrame(
      trace(
        '    at listOnTimeout (/srv/board/dist/timers.js:581:17)',
        '    at Worker.tick (/srv/board/src/worker.ts:3:9)',
      ),
    );

    expect(located).toEqual({ file: 'worker.ts', line: 3 });
  });
});
