import { z } from 'zod';

// Zod schema for a single connection block
export const ConnectionConfigSchema = z.object({
  name: z.string().min(1, 'Connection name is required'),
  // Present-but-empty values are kept: they override the environment
  baseurl: z.string().optional(),
  token: z.string().optional(),
});

// Complete configuration file schema
export const ConfigFileSchema = z.object({
  connections: z.array(ConnectionConfigSchema).min(1, 'At least one connection must be configured'),
}).refine(
  (data) => new Set(data.connections.map((c) => c.name)).size === data.connections.length,
  { message: 'Connection names must be unique', path: ['connections'] }
);

// TypeScript types derived from Zod schemas
export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// Environment variables consulted for connection defaults
export interface ConnectionEnv {
  GITLAB_ADDR?: string;
  GITLAB_TOKEN?: string;
}

// Merged connection settings, built once and shared by every handler
export interface ConnectionSettings {
  baseUrl: string;
  token: string;
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: keyof ConnectionSettings
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
