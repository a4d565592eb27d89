#!/usr/bin/env tsx
/**
 * Pre-flight check for wavecast: the env parses and both engine binaries run.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0: all required checks pass
 *   1: one or more required checks failed
 */
import { execFileSync } from 'child_process';
import { accessSync, constants, mkdirSync } from 'fs';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

let anyRequiredFailed = false;

// ── Section: Environment ──────────────────────────────────────────────────────

console.log(`\n${BOLD}=== wavecast: Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Environment variables${RESET}`);

// Imported lazily so a schema failure is reported here rather than as a crash
const config = await import('../src/config.js').catch((err: unknown) => {
  fail('Environment schema', err instanceof Error ? err.message : String(err));
  anyRequiredFailed = true;
  return null;
});

if (config) {
  const { env } = config;
  for (const [name, value] of Object.entries(env)) {
    console.log(`  ${YELLOW}○${RESET} ${name}  ${value}${process.env[name] ? '' : '  (default)'}`);
  }

  // ── Section: Engine binaries ────────────────────────────────────────────────

  console.log(`\n${BOLD}[ 2 ] Engine binaries${RESET}`);

  const checkBinary = (label: string, bin: string): void => {
    try {
      const out = execFileSync(bin, ['-version'], { encoding: 'utf-8', timeout: 10_000 });
      pass(label, out.split('\n')[0] ?? '');
    } catch (err) {
      fail(label, `${bin} -version failed (${err instanceof Error ? err.message : String(err)}); install ffmpeg or set ${label}`);
      anyRequiredFailed = true;
    }
  };
  checkBinary('FFMPEG_PATH', env.FFMPEG_PATH);
  checkBinary('FFPROBE_PATH', env.FFPROBE_PATH);

  // ── Section: Scratch space ──────────────────────────────────────────────────

  console.log(`\n${BOLD}[ 3 ] Scratch directory${RESET}`);
  try {
    mkdirSync(env.TEMP_DIR, { recursive: true });
    accessSync(env.TEMP_DIR, constants.W_OK);
    pass('TEMP_DIR writable', env.TEMP_DIR);
  } catch (err) {
    fail('TEMP_DIR writable', err instanceof Error ? err.message : String(err));
    anyRequiredFailed = true;
  }
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}Pre-flight check failed; fix the issues above.${RESET}\n`);
  process.exit(1);
}
console.log(`${GREEN}${BOLD}All checks passed, ready to run wavecast.${RESET}\n`);
