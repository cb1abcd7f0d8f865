#!/usr/bin/env tsx
/**
 * Pre-flight check: environment variables, the ffmpeg binary and the Supabase
 * connection.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { createClient } from '@supabase/supabase-js';
import { config as dotenvConfig } from 'dotenv';
import { ffmpegVersion } from '../src/media/ffmpeg.js';

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

const skip = (label: string, why: string) =>
  console.log(`  ${YELLOW}○${RESET} ${label}  (${why})`);

let anyRequiredFailed = false;

function secret(label: string, required: boolean, hint: string): boolean {
  const value = process.env[label];
  if (value && value.trim().length > 0) {
    // Mask secrets: show first 6 chars + ellipsis
    pass(label, value.length > 10 ? `${value.slice(0, 6)}…` : '(set)');
    return true;
  }
  if (required) {
    fail(label, hint);
    anyRequiredFailed = true;
  } else {
    skip(label, 'not set — optional');
  }
  return false;
}

// ── Section: environment variables ────────────────────────────────────────────

console.log(`\n${BOLD}=== cutplan — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Reasoning service${RESET}`);

secret('ANTHROPIC_API_KEY', true,  'Get from https://console.anthropic.com');
secret('OPENAI_API_KEY',    false, 'Used only when Claude returns a server error');

console.log(`\n${BOLD}[ 2 ] Scene index / run history${RESET}`);

const hasUrl = secret('SUPABASE_URL',         false, 'Supabase project settings → API');
const hasKey = secret('SUPABASE_SERVICE_KEY', false, 'Supabase project settings → API → service_role key');
if (!hasUrl || !hasKey) {
  skip('Supabase', 'runs need --scenes <file> and keep no history');
}

console.log(`\n${BOLD}[ 3 ] Configuration${RESET}`);

function checkOptional(label: string, defaultVal: string): void {
  const value = process.env[label];
  console.log(`  ${YELLOW}○${RESET} ${label}  ${value || defaultVal}${value ? '' : '  (default)'}`);
}

checkOptional('OUTPUT_DIR',          './edited');
checkOptional('TEMP_DIR',            '/tmp/cutplan');
checkOptional('WORKER_LIMIT',        '2');
checkOptional('MAX_RETRIES',         '2');
checkOptional('RETRY_BASE_DELAY_MS', '1000');
checkOptional('DISABLED_OPERATIONS', '(none)');
checkOptional('LOG_LEVEL',           'info');

// ── Section: ffmpeg ───────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] ffmpeg${RESET}`);

const ffmpegPath = process.env['FFMPEG_PATH'] || 'ffmpeg';
const version = ffmpegVersion(ffmpegPath);
if (version) {
  pass(ffmpegPath, version);
} else {
  fail(`${ffmpegPath} not runnable`, 'Install ffmpeg or point FFMPEG_PATH at the binary');
  anyRequiredFailed = true;
}

// ── Section: Supabase connection ──────────────────────────────────────────────

console.log(`\n${BOLD}[ 5 ] Supabase connection${RESET}`);

const supabaseUrl = process.env['SUPABASE_URL'];
const supabaseKey = process.env['SUPABASE_SERVICE_KEY'];

if (supabaseUrl && supabaseKey) {
  process.stdout.write(`  Testing Supabase connection… `);
  try {
    const sb = createClient(supabaseUrl, supabaseKey);
    const { error } = await sb.from('scenes').select('video_id').limit(1);
    if (error && !error.message.includes('does not exist') && !error.message.includes('relation')) {
      throw new Error(error.message);
    }
    console.log(`${GREEN}✓${RESET}  connected${error ? `  ${YELLOW}(tables missing — run npm run setup-db)${RESET}` : ''}`);
  } catch (err) {
    console.log(`${RED}✗${RESET}`);
    fail('Supabase connection failed', err instanceof Error ? err.message : String(err));
    anyRequiredFailed = true;
  }
} else {
  skip('Supabase connection', 'credentials not set');
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}`);
  if (supabaseUrl && supabaseKey) console.log(`${YELLOW}Next: npm run setup-db${RESET}`);
  console.log('');
}
