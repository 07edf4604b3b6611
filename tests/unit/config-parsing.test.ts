/**
 * Unit tests for servers config parsing and validation
 */

import { describe, it, expect } from 'vitest';
import _ from 'lodash';
import { ServersConfigSchema } from '../../src/types/config.js';

describe('ServersConfigSchema', () => {
    it('parses a full server entry', () => {
        const result = ServersConfigSchema.parse({
            mcpServers: {
                filesystem: {
                    command: 'fsd',
                    args:    ['--root', '.'],
                    env:     { API_KEY: 'test-key' },
                    cwd:     'servers/fs',
                },
            },
        });

        expect(result.mcpServers.filesystem).toEqual({
            command: 'fsd',
            args:    ['--root', '.'],
            env:     { API_KEY: 'test-key' },
            cwd:     'servers/fs',
        });
    });

    it('parses a minimal entry without optional fields', () => {
        const result = ServersConfigSchema.parse({ mcpServers: { time: { command: 'timed' } } });

        expect(result.mcpServers.time).toEqual({ command: 'timed' });
    });

    it('keeps server order as written', () => {
        const result = ServersConfigSchema.parse({
            mcpServers: {
                zeta:  { command: 'z' },
                alpha: { command: 'a' },
                mid:   { command: 'm' },
            },
        });

        expect(_.keys(result.mcpServers)).toEqual(['zeta', 'alpha', 'mid']);
    });

    it('strips unknown fields', () => {
        const result = ServersConfigSchema.parse({
            mcpServers: { time: { command: 'timed', disabled: false } },
        });

        expect(result.mcpServers.time).toEqual({ command: 'timed' });
    });

    it('rejects an entry without a command', () => {
        const result = ServersConfigSchema.safeParse({ mcpServers: { broken: { args: [] } } });

        expect(result.success).toBe(false);
    });

    it('rejects an empty command', () => {
        const result = ServersConfigSchema.safeParse({ mcpServers: { broken: { command: '' } } });

        expect(result.success).toBe(false);
        if(!result.success) {
            expect(result.error.issues[0]?.message).toBe('Command cannot be empty');
        }
    });

    it('rejects wrong field types', () => {
        const result = ServersConfigSchema.safeParse({
            mcpServers: { broken: { command: 123, args: 'not-an-array' } },
        });

        expect(result.success).toBe(false);
    });

    it('rejects non-stdio transport types', () => {
        const result = ServersConfigSchema.safeParse({
            mcpServers: { remote: { command: 'x', type: 'sse' } },
        });

        expect(result.success).toBe(false);
        if(!result.success) {
            expect(result.error.issues[0]?.path).toEqual(['mcpServers', 'remote', 'type']);
        }
    });

    it('rejects a document without mcpServers', () => {
        expect(ServersConfigSchema.safeParse({ servers: {} }).success).toBe(false);
    });
});
