/**
 * Live execution logger for verisolve.
 *
 * All output goes to stderr so stdout stays clean for the JSON result.
 * Emoji prefixes give instant visual context in the terminal.
 */

let silent = false;

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  if (silent) return;
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function setSilent(value: boolean): void {
  silent = value;
}

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function attempt(index: number, total: number): void {
  write(`🔁 Attempt [${String(index + 1)}/${String(total)}]`);
}

export function check(passed: boolean, name: string, details: string): void {
  const icon = passed ? '✅' : '❌';
  write(`   ${icon} ${name}: ${details}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function llm(message: string): void {
  write(`🧠 ${message}`);
}

export function verdict(success: boolean, message: string): void {
  write(`${success ? '🎯' : '🛑'} ${message}`);
}
