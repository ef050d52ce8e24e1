import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { ToolRegistry, parseToolArguments } from '../registry.js';
import { IMAGE_SEARCH, TEXT_SEARCH, type ToolDefinition } from '../types.js';
import type { CatalogItem } from '../../catalog.js';
import {
  MalformedToolArguments,
  ProviderFailure,
  StoreQueryFailure,
  ToolDispatchFailure,
} from '../../../utils/errors.js';

const lamp: CatalogItem = {
  id: 'lamp-1',
  name: 'Desk Lamp',
  category: 'Home',
  description: 'Adjustable LED desk lamp',
  price: 35,
  image_path: 'images/lamp.jpg',
  tags: [],
};

function createTextTool(
  execute: ToolDefinition<typeof TEXT_SEARCH>['execute'] = async () => [lamp],
  description = 'Search by text',
): ToolDefinition<typeof TEXT_SEARCH> {
  return {
    name: TEXT_SEARCH,
    description,
    parameters: [
      { name: 'query', type: 'string', description: 'Search query', required: true },
      { name: 'n_results', type: 'integer', description: 'Result limit', required: false, default: 5 },
    ],
    schema: z.object({ query: z.string().min(1), n_results: z.number().int().positive().default(5) }),
    execute,
  };
}

function createImageTool(): ToolDefinition<typeof IMAGE_SEARCH> {
  return {
    name: IMAGE_SEARCH,
    description: 'Search by image',
    parameters: [
      { name: 'image_base64', type: 'string', description: 'Image data', required: true },
    ],
    schema: z.object({ image_base64: z.string().min(1), n_results: z.number().int().positive().default(5) }),
    execute: async () => [],
  };
}

describe('Tool Registry', () => {
  it('should register and retrieve tools', () => {
    const registry = new ToolRegistry();
    const textTool = createTextTool();

    registry.register(textTool);
    expect(registry.has(TEXT_SEARCH)).toBe(true);
    expect(registry.get(TEXT_SEARCH)).toBe(textTool);
    expect(registry.has(IMAGE_SEARCH)).toBe(false);
  });

  it('should not resolve names outside the operation set', () => {
    const registry = new ToolRegistry();
    registry.register(createTextTool());

    expect(registry.get('web_search')).toBeUndefined();
    expect(registry.has('web_search')).toBe(false);
  });

  it('should list all registered tools', () => {
    const registry = new ToolRegistry();

    registry.register(createTextTool());
    registry.register(createImageTool());

    const allTools = registry.getAll();
    expect(allTools.length).toBe(2);
    expect(allTools.map(t => t.name)).toEqual([TEXT_SEARCH, IMAGE_SEARCH]);
  });

  it('should convert tools to provider function format', () => {
    const registry = new ToolRegistry();
    registry.register(createTextTool());

    const providerTools = registry.toProviderTools();
    expect(providerTools.length).toBe(1);

    const tool = providerTools[0];
    expect(tool.type).toBe('function');
    expect(tool.function.name).toBe(TEXT_SEARCH);
    expect(tool.function.description).toBe('Search by text');
    expect(tool.function.parameters.type).toBe('object');
    expect(tool.function.parameters.required).toEqual(['query']);
    expect(tool.function.parameters.properties.query).toEqual({ type: 'string', description: 'Search query' });
    expect(tool.function.parameters.properties.n_results).toEqual({
      type: 'integer',
      description: 'Result limit',
      default: 5,
    });
  });

  it('should handle tool overwriting', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const registry = new ToolRegistry();

    registry.register(createTextTool(undefined, 'Version 1'));
    registry.register(createTextTool(undefined, 'Version 2'));

    expect(registry.getAll().length).toBe(1);
    expect(registry.get(TEXT_SEARCH)?.description).toBe('Version 2');
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  describe('dispatch', () => {
    it('runs the tool with validated arguments and defaults applied', async () => {
      const execute = vi.fn(async () => [lamp]);
      const registry = new ToolRegistry();
      registry.register(createTextTool(execute));

      const result = await registry.dispatch(TEXT_SEARCH, { query: 'lamp' });

      expect(execute).toHaveBeenCalledWith({ query: 'lamp', n_results: 5 });
      expect(result.status).toBe('ok');
      if (result.status === 'ok') {
        expect(result.operation).toBe(TEXT_SEARCH);
        expect(result.items).toEqual([lamp]);
        expect(result.durationMs).toBeGreaterThanOrEqual(0);
      }
    });

    it('reaches the tool on every call', async () => {
      const execute = vi.fn(async () => [lamp]);
      const registry = new ToolRegistry();
      registry.register(createTextTool(execute));

      await registry.dispatch(TEXT_SEARCH, { query: 'lamp' });
      await registry.dispatch(TEXT_SEARCH, { query: 'lamp' });

      expect(execute).toHaveBeenCalledTimes(2);
    });

    it('reports unknown names instead of throwing', async () => {
      const registry = new ToolRegistry();
      registry.register(createTextTool());

      await expect(registry.dispatch('calculator', {})).resolves.toEqual({ status: 'unknown', name: 'calculator' });
    });

    it('reports unregistered operations as unknown', async () => {
      const registry = new ToolRegistry();

      await expect(registry.dispatch(IMAGE_SEARCH, { image_base64: 'abc' }))
        .resolves.toEqual({ status: 'unknown', name: IMAGE_SEARCH });
    });

    it('fails with MalformedToolArguments when the schema rejects the arguments', async () => {
      const execute = vi.fn(async () => [lamp]);
      const registry = new ToolRegistry();
      registry.register(createTextTool(execute));

      const result = await registry.dispatch(TEXT_SEARCH, { n_results: 3 });

      expect(execute).not.toHaveBeenCalled();
      expect(result.status).toBe('failed');
      if (result.status === 'failed') {
        expect(result.error).toBeInstanceOf(MalformedToolArguments);
        expect(result.error.operation).toBe(TEXT_SEARCH);
      }
    });

    it('wraps a throwing tool in ToolDispatchFailure', async () => {
      const registry = new ToolRegistry();
      registry.register(createTextTool(async () => {
        throw new Error('index unavailable');
      }));

      const result = await registry.dispatch(TEXT_SEARCH, { query: 'lamp' });

      expect(result.status).toBe('failed');
      if (result.status === 'failed') {
        expect(result.error).toBeInstanceOf(ToolDispatchFailure);
        expect(result.error).not.toBeInstanceOf(MalformedToolArguments);
        expect(result.error.message).toBe(`Tool "${TEXT_SEARCH}" failed: index unavailable`);
      }
    });

    it('lets embedding and store failures through', async () => {
      const registry = new ToolRegistry();
      registry.register(createTextTool(async () => {
        throw new StoreQueryFailure('products_text', 'Query against products_text failed: disk gone');
      }));

      await expect(registry.dispatch(TEXT_SEARCH, { query: 'lamp' })).rejects.toBeInstanceOf(ProviderFailure);
    });
  });
});

describe('parseToolArguments', () => {
  it('parses a JSON object', () => {
    expect(parseToolArguments({ id: 'c1', name: TEXT_SEARCH, arguments: '{"query":"lamp","n_results":2}' }))
      .toEqual({ query: 'lamp', n_results: 2 });
  });

  it('treats an empty payload as no arguments', () => {
    expect(parseToolArguments({ id: 'c1', name: TEXT_SEARCH, arguments: '  ' })).toEqual({});
  });

  it('rejects invalid JSON', () => {
    expect(() => parseToolArguments({ id: 'c1', name: TEXT_SEARCH, arguments: '{query:' }))
      .toThrow(MalformedToolArguments);
  });

  it('rejects JSON that is not an object', () => {
    expect(() => parseToolArguments({ id: 'c1', name: TEXT_SEARCH, arguments: '["lamp"]' }))
      .toThrow(`Arguments for "${TEXT_SEARCH}" must be a JSON object`);
    expect(() => parseToolArguments({ id: 'c1', name: TEXT_SEARCH, arguments: '"lamp"' }))
      .toThrow(MalformedToolArguments);
  });
});
