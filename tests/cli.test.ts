import { spawnSync } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { scrambleInPlace, unscrambleInPlace } from '../src/utils/scramble';
import { otaV1, signed } from './helpers/builders';

const rootDir = path.join(__dirname, '..');
const scriptPath = path.join(rootDir, 'bin', 'cli.ts');

function runCli(args: string[]) {
  return spawnSync(process.execPath, ['-r', 'ts-node/register', scriptPath, ...args], {
    cwd: rootDir,
    encoding: 'utf8',
    env: { ...process.env, TS_NODE_TRANSPILE_ONLY: 'true' }, // Speed up
  });
}

jest.setTimeout(60000);

describe('CLI Integration', () => {
  const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'ereader-fw-cli-'));
  const payload = Buffer.from('payload bytes \x00\x01\x02\xff');
  const firmware = path.join(tmp, 'update.bin');
  const bogus = path.join(tmp, 'bogus.bin');
  const nested = path.join(tmp, 'nested.bin');

  beforeAll(() => {
    fs.writeFileSync(firmware, Buffer.concat([signed(1, otaV1({ targetRevision: 4242 })), payload]));
    fs.writeFileSync(bogus, Buffer.from('ZZZZ0000'));
    fs.writeFileSync(nested, signed(0, signed(0, otaV1())));
  });
  afterAll(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  test('should show help', () => {
    const child = runCli(['--help']);
    expect(child.stdout).toContain('Usage: ereader-fw');
    expect(child.status).toBe(0);
  });

  test('should show version', () => {
    const child = runCli(['--version']);
    expect(child.stdout.trim()).toBe('0.1.0');
    expect(child.status).toBe(0);
  });

  test('should print the decoded header as JSON', () => {
    const child = runCli(['inspect', firmware, '--format', 'json']);
    expect(child.status).toBe(0);

    const parsed = JSON.parse(child.stdout);
    expect(parsed.bundle.magic).toBe('SP01');
    expect(parsed.bundle.envelope.certificateId).toBe(1);
    expect(parsed.bundle.envelope.inner.header.targetRevision).toBe(4242);
  });

  test('should print a text report through the info alias', () => {
    const child = runCli(['info', firmware]);
    expect(child.status).toBe(0);
    expect(child.stdout).toContain('Production 1K (pubprodkey01.pem)');
    expect(child.stdout).toContain('4242');
  });

  test('should fail with a hint on an unknown magic', () => {
    const child = runCli(['inspect', bogus]);
    expect(child.status).toBe(1);
    expect(child.stderr).toContain('Unknown bundle magic "ZZZZ"');
    expect(child.stderr).toContain('Hint: The file does not start with a known bundle magic');
  });

  test('should refuse an envelope chain deeper than --max-depth', () => {
    expect(runCli(['--max-depth', '2', 'inspect', nested, '--format', 'json']).status).toBe(0);

    const child = runCli(['--max-depth', '1', 'inspect', nested]);
    expect(child.status).toBe(1);
    expect(child.stderr).toContain('Signature envelopes nested deeper than 1 levels');
    expect(child.stderr).toContain('Hint: Raise --max-depth');
  });

  test('should dump the unscrambled payload to a file', () => {
    const out = path.join(tmp, 'payload.tar.gz');
    const child = runCli(['dump', firmware, out]);
    expect(child.status).toBe(0);
    expect(fs.readFileSync(out).equals(unscrambleInPlace(Buffer.from(payload)))).toBe(true);
  });

  test('should round-trip a stream through md and dm', () => {
    const plain = path.join(tmp, 'plain.txt');
    const mangled = path.join(tmp, 'mangled.bin');
    const restored = path.join(tmp, 'restored.txt');
    fs.writeFileSync(plain, 'some archive bytes');

    expect(runCli(['md', plain, mangled]).status).toBe(0);
    expect(fs.readFileSync(mangled).equals(scrambleInPlace(Buffer.from('some archive bytes')))).toBe(true);

    expect(runCli(['dm', mangled, restored]).status).toBe(0);
    expect(fs.readFileSync(restored, 'utf8')).toBe('some archive bytes');
  });
});
