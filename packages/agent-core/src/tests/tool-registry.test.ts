import { DuplicateNameError, NotFoundError, ToolUnavailableError } from '../errors';
import { ToolRegistry, qualifiedToolName } from '../tools/tool-registry';
import { silentLogger } from '../types/common';
import { EMPTY_SCHEMA, localTool } from './helpers';

const okHandler = async () => 'ok';

function serverTool(name: string) {
  return { name, description: `Remote ${name}`, inputSchema: EMPTY_SCHEMA, handler: okHandler };
}

describe('ToolRegistry', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry(silentLogger);
  });

  it('should register and look up local tools in registration order', () => {
    registry.register(localTool('file-read', okHandler));
    registry.register(localTool('grep', okHandler));

    expect(registry.lookup('grep').name).toBe('grep');
    expect(registry.catalog().map(entry => entry.name)).toEqual(['file-read', 'grep']);
    expect(registry.catalog()[0]).toEqual({ name: 'file-read', description: 'Test tool file-read', inputSchema: EMPTY_SCHEMA });
  });

  it('should reject duplicate names', () => {
    registry.register(localTool('grep', okHandler));
    expect(() => registry.register(localTool('grep', okHandler))).toThrow(DuplicateNameError);
  });

  it('should throw NotFound for unknown tools', () => {
    expect(() => registry.lookup('missing')).toThrow(NotFoundError);
    expect(() => registry.unregister('missing')).toThrow('Tool not found: missing');
  });

  it('should qualify remote tool names with the server name', () => {
    expect(qualifiedToolName('time', 'now')).toBe('time_now');
    const definitions = registry.registerServer('time', [serverTool('now'), serverTool('zone')]);

    expect(definitions.map(definition => definition.name)).toEqual(['time_now', 'time_zone']);
    expect(registry.lookup('time_now').source).toEqual({ kind: 'remote', serverName: 'time' });
    expect(registry.serverToolNames('time')).toEqual(['time_now', 'time_zone']);
  });

  it('should register none of a server\'s tools when one collides', () => {
    registry.register(localTool('time_zone', okHandler));
    expect(() => registry.registerServer('time', [serverTool('now'), serverTool('zone')])).toThrow(DuplicateNameError);
    expect(registry.has('time_now')).toBe(false);
    expect(registry.hasServer('time')).toBe(false);
  });

  it('should refuse to unregister a remote tool individually', () => {
    registry.registerServer('time', [serverTool('now')]);
    expect(() => registry.unregister('time_now')).toThrow('unregister the server instead');
  });

  it('should remove a server\'s tools and release it', async () => {
    const release = jest.fn(async () => {});
    registry.registerServer('time', [serverTool('now')], release);

    await registry.unregisterServer('time');

    expect(registry.has('time_now')).toBe(false);
    expect(registry.hasServer('time')).toBe(false);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('should wait for leased invocations before removing a server', async () => {
    registry.registerServer('time', [serverTool('now')]);
    const lease = registry.acquire('time_now');

    let removed = false;
    const removal = registry.unregisterServer('time').then(() => {
      removed = true;
    });
    await Promise.resolve();

    // Removal has started: new invocations are refused and the catalog hides the tools
    expect(removed).toBe(false);
    expect(() => registry.acquire('time_now')).toThrow(ToolUnavailableError);
    expect(registry.catalog()).toEqual([]);

    lease.release();
    await removal;
    expect(removed).toBe(true);
    expect(registry.has('time_now')).toBe(false);
  });

  it('should treat a second release of the same lease as a no-op', async () => {
    registry.registerServer('time', [serverTool('now')]);
    const first = registry.acquire('time_now');
    const second = registry.acquire('time_now');
    first.release();
    first.release();

    let removed = false;
    const removal = registry.unregisterServer('time').then(() => {
      removed = true;
    });
    await Promise.resolve();
    expect(removed).toBe(false);

    second.release();
    await removal;
    expect(removed).toBe(true);
  });
});
