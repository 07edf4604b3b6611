/**
 * Configuration type definitions for the session host
 */

import { z } from 'zod';

/**
 * One server entry (compatible with Claude Desktop's mcp.json format).
 * Only stdio transport is supported, so a "type" field is rejected.
 */
export const ServerEntrySchema = z.object({
    command: z.string().min(1, 'Command cannot be empty'),
    args:    z.array(z.string()).optional(),
    env:     z.record(z.string(), z.string()).optional(),
    cwd:     z.string().min(1, 'cwd cannot be empty').optional(),
})
    .passthrough()
    .superRefine((entry, ctx) => {
        if('type' in entry) {
            ctx.addIssue({
                code:    z.ZodIssueCode.custom,
                message: `Only stdio transport is supported. Received type: "${String(entry.type)}"`,
                path:    ['type'],
            });
        }
    })
    .transform((entry) => {
        // Strip extra fields
        const result: ServerEntry = { command: entry.command };
        if(entry.args !== undefined) {
            result.args = entry.args;
        }
        if(entry.env !== undefined) {
            result.env = entry.env;
        }
        if(entry.cwd !== undefined) {
            result.cwd = entry.cwd;
        }
        return result;
    });

export const ServersConfigSchema = z.object({
    mcpServers: z.record(z.string().min(1, 'Server name cannot be empty'), ServerEntrySchema),
});

export interface ServerEntry {
    command: string
    args?:   string[]
    env?:    Record<string, string>
    cwd?:    string
}

export type ServersConfig = z.infer<typeof ServersConfigSchema>;

/**
 * A fully resolved server descriptor: unique name, absolute working directory.
 */
export interface ServerDescriptor {
    readonly name:    string
    readonly command: string
    readonly args:    readonly string[]
    readonly env?:    Readonly<Record<string, string>>
    readonly cwd:     string
}
