import stripAnsi from 'strip-ansi';

/**
 * Idle prompt of the mariadb client. The bracket holds the current database,
 * `(none)` before a `USE`.
 */
export const DEFAULT_PROMPT = /MariaDB \[.*\]>[ \t]/;

export const CLIENT_ERROR_MARKER = 'ERROR';

const CREDENTIAL_REJECTION = /Access denied for user/;

/**
 * Build a prompt matcher from configured text. Global and sticky flags are
 * dropped: a matcher must not carry lastIndex between reads.
 */
export function compilePrompt(pattern: string | RegExp): RegExp {
  if (typeof pattern === 'string') {
    return new RegExp(pattern);
  }
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

/**
 * Clean terminal control sequences out of raw pty output
 */
export function cleanTerminalOutput(text: string): string {
  let cleaned = stripAnsi(text);

  // OSC sequences (window title updates)
  cleaned = cleaned.replace(/\x1b\][^\x07]*\x07/g, '');

  cleaned = cleaned.replace(/\0/g, '');

  cleaned = cleaned.replace(/\r\n/g, '\n');
  cleaned = cleaned.replace(/\r/g, '');

  return cleaned;
}

/**
 * Turn the raw text captured before a prompt into the reply of `sent`: the
 * terminal echo of the submitted line is removed along with surrounding blank
 * lines and trailing whitespace.
 */
export function cleanReply(raw: string, sent: string): string {
  const cleaned = cleanTerminalOutput(raw);
  const echoEnd = matchEcho(cleaned, sent.trim());
  const reply = echoEnd === -1 ? cleaned : cleaned.slice(echoEnd);

  return reply.replace(/^\n+/, '').trimEnd();
}

/**
 * Offset just past the echo of `sent` at the start of `text`, or -1. A long
 * echo comes back wrapped at the terminal width, so line breaks and blanks
 * the terminal put in are skipped.
 */
function matchEcho(text: string, sent: string): number {
  if (sent.length === 0) return -1;

  let i = 0;
  let j = 0;
  while (j < sent.length) {
    if (i >= text.length) return -1;
    if (text[i] === sent[j]) {
      i++;
      j++;
    } else if (text[i] === '\n' || text[i] === ' ') {
      i++;
    } else {
      return -1;
    }
  }

  return text[i] === '\n' ? i + 1 : i;
}

export function isClientError(reply: string): boolean {
  return reply.startsWith(CLIENT_ERROR_MARKER);
}

export function detectCredentialRejection(output: string): boolean {
  return CREDENTIAL_REJECTION.test(cleanTerminalOutput(output));
}

/** Line input ends a statement once a line closes with `;` or `\G`. */
export function isStatementComplete(line: string): boolean {
  const trimmed = line.trimEnd();
  return trimmed.endsWith(';') || trimmed.endsWith('\\G');
}
