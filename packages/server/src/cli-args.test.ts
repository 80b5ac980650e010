import { describe, it, expect } from 'vitest';
import { parseArgs } from './cli-args';

describe('parseArgs', () => {
  it('reads every flag', () => {
    expect(parseArgs(['-c', 'my.yml', '--port', '9000', '--host', '0.0.0.0', '--console'])).toEqual({
      configPath: 'my.yml',
      port: 9000,
      host: '0.0.0.0',
      console: true
    });
    expect(parseArgs(['--init'])).toEqual({ init: true });
    expect(parseArgs(['-v'])).toEqual({ version: true });
  });

  it('asks for help on malformed values', () => {
    expect(parseArgs(['--port', 'abc'])).toEqual({ help: true });
    expect(parseArgs(['--port', '70000'])).toEqual({ help: true });
    expect(parseArgs(['--host', '--console'])).toEqual({ help: true, console: true });
  });

  it('ignores unknown arguments', () => {
    expect(parseArgs(['serve', '--verbose'])).toEqual({});
  });
});
