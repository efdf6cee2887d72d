/**
 * Log line formatting tests
 */
import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import {
  colors,
  formatForConsole,
  formatForFile,
  parseLogLine,
  stripAnsiCodes,
} from '../../src/utils/logger/utils.js';

describe('log formatting', () => {
  it('writes plain file lines with a UTC timestamp', () => {
    assert.equal(formatForFile({ level: 30, time: 0, msg: 'cycle done' }), '[INFO] 1970-01-01 00:00:00.000 cycle done\n');
  });

  it('appends extra data as JSON', () => {
    assert.equal(
      formatForFile({ level: 50, time: 0, msg: 'update failed', extra: { dealId: 42 } }),
      '[ERROR] 1970-01-01 00:00:00.000 update failed {"dealId":42}\n',
    );
  });

  it('colours console lines by level', () => {
    assert.equal(
      formatForConsole({ level: 40, time: 0, msg: 'slow down' }),
      `${colors.yellow}[WARN] 1970-01-01 00:00:00.000 slow down${colors.reset}\n`,
    );
    assert.equal(formatForConsole({ level: 30, time: 0, msg: 'hello' }), '[INFO] 1970-01-01 00:00:00.000 hello\n');
  });

  it('strips colour codes from file output', () => {
    assert.equal(stripAnsiCodes(`${colors.red}red${colors.reset}`), 'red');
    assert.equal(
      formatForFile({ level: 30, time: 0, msg: `${colors.green}ok${colors.reset}` }),
      '[INFO] 1970-01-01 00:00:00.000 ok\n',
    );
  });

  it('parses pino lines and ignores unknown levels', () => {
    assert.deepEqual(parseLogLine('{"level":30,"time":5,"msg":"m"}'), {
      level: 30,
      time: 5,
      msg: 'm',
      extra: undefined,
    });
    assert.equal(parseLogLine('{"level":99,"time":5,"msg":"m"}'), null);
    assert.equal(parseLogLine('"text"'), null);
  });
});
