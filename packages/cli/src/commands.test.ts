import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { runCli, type CliIO } from './commands.js';

const TokensOutput = z.object({ checksum: z.string(), tokens: z.array(z.string()) });
const OpenApiOutput = z.object({ servers: z.array(z.object({ url: z.string() })) });

function captureIO(env: Record<string, string | undefined> = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    out: (message) => out.push(message),
    err: (message) => err.push(message),
    env,
  };
  return { io, out, err };
}

describe('runCli', () => {
  it('prints the checksum and one token per word for tokens', async () => {
    const { io, out, err } = captureIO();
    expect(await runCli(['tokens', 'hello', 'world'], io)).toBe(0);
    expect(err).toEqual([]);
    expect(out).toHaveLength(1);
    const result = TokensOutput.parse(JSON.parse(out[0]));
    expect(result.checksum).toBe('b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9');
    expect(result.tokens).toHaveLength(2);
    for (const token of result.tokens) {
      expect(token).toMatch(/^[0-9a-f]{16}$/);
    }
  });

  it('prints a single token for tokens without text', async () => {
    const { io, out } = captureIO();
    expect(await runCli(['tokens'], io)).toBe(0);
    const result = TokensOutput.parse(JSON.parse(out[0]));
    expect(result.checksum).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    expect(result.tokens).toHaveLength(1);
  });

  it('prints a 32-char hex token for generate', async () => {
    const { io, out } = captureIO();
    expect(await runCli(['generate'], io)).toBe(0);
    expect(out).toHaveLength(1);
    expect(out[0]).toMatch(/^[0-9a-f]{32}$/);
  });

  it('prints the OpenAPI document for the configured base URL', async () => {
    const { io, out } = captureIO({ BASE_URL: 'https://tokens.example.test' });
    expect(await runCli(['openapi'], io)).toBe(0);
    expect(OpenApiOutput.parse(JSON.parse(out[0])).servers).toEqual([{ url: 'https://tokens.example.test' }]);
  });

  it('prints usage for help', async () => {
    const { io, out } = captureIO();
    expect(await runCli(['--help'], io)).toBe(0);
    expect(out).toHaveLength(1);
    expect(out[0]).toContain('tokensum tokens <text>');
  });

  it('exits 1 with usage on an unknown command', async () => {
    const { io, out, err } = captureIO();
    expect(await runCli(['frobnicate'], io)).toBe(1);
    expect(out).toEqual([]);
    expect(err[0]).toBe('Unknown command: frobnicate');
    expect(err[1]).toContain('Usage:');
  });

  it('exits 1 and lists each invalid setting', async () => {
    const { io, err } = captureIO({ PORT: 'eighty' });
    expect(await runCli(['openapi'], io)).toBe(1);
    expect(err).toEqual(['[tokensum] Invalid configuration:', '  - PORT: Expected number, received nan']);
  });
});
