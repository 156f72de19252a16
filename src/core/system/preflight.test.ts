import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { findTool, requireRoot, requireTools } from './preflight';
import { PreflightError } from '../errors';

describe('requireRoot', () => {
  it('passes for uid 0', () => {
    expect(() => requireRoot(() => 0)).not.toThrow();
  });

  it('rejects other users', () => {
    expect(() => requireRoot(() => 1000)).toThrow(PreflightError);
    expect(() => requireRoot(() => 1000)).toThrow('Please run as root.');
  });
});

describe('findTool / requireTools', () => {
  let binDir: string;

  beforeEach(async () => {
    binDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cpugovernor-preflight-test-'));
    await fs.writeFile(path.join(binDir, 'cpugov-fake-tool'), '#!/bin/sh\n', { mode: 0o755 });
    await fs.ensureDir(path.join(binDir, 'cpugov-fake-dir'));
  });

  afterEach(async () => {
    await fs.remove(binDir);
  });

  it('finds a tool on PATH', () => {
    expect(findTool('cpugov-fake-tool', binDir)).toBe(path.join(binDir, 'cpugov-fake-tool'));
  });

  it('ignores directories with the tool name', () => {
    expect(findTool('cpugov-fake-dir', binDir)).toBeNull();
  });

  it('lists every missing tool', () => {
    expect(() => requireTools(['cpugov-fake-tool', 'cpugov-missing-a', 'cpugov-missing-b'], binDir)).toThrow(
      'Required tools not found: cpugov-missing-a, cpugov-missing-b'
    );
  });

  it('passes when all tools are present', () => {
    expect(() => requireTools(['cpugov-fake-tool'], binDir)).not.toThrow();
  });
});
