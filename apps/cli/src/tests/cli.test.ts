import { parseCommand } from '../cli';

describe('parseCommand', () => {
  it('should treat anything without a leading slash as a message', () => {
    expect(parseCommand('  fix the failing test  ')).toEqual({ kind: 'message', text: 'fix the failing test' });
    expect(parseCommand('a/b')).toEqual({ kind: 'message', text: 'a/b' });
  });

  it('should ignore blank input', () => {
    expect(parseCommand('   ')).toEqual({ kind: 'empty' });
  });

  it('should recognise commands case-insensitively', () => {
    expect(parseCommand('/cancel')).toEqual({ kind: 'cancel' });
    expect(parseCommand('/TOOLS')).toEqual({ kind: 'tools' });
    expect(parseCommand('/servers')).toEqual({ kind: 'servers' });
    expect(parseCommand('/transcript')).toEqual({ kind: 'transcript' });
    expect(parseCommand('/quit')).toEqual({ kind: 'exit' });
    expect(parseCommand('/exit now')).toEqual({ kind: 'exit' });
    expect(parseCommand('/')).toEqual({ kind: 'help' });
  });

  it('should report unknown commands by name', () => {
    expect(parseCommand('/rules list')).toEqual({ kind: 'unknown', name: '/rules' });
  });
});
