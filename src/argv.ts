// ── Command lines ──────────────────────────────────────────────────
//
// Commands are kept as argv arrays and written out with double-quote
// quoting, which both systemd's ExecStart= parser and splitCommand read
// back to the same arguments.

const NEEDS_QUOTES = /[\s"'\\]/;

export function quoteArg(arg: string): string {
  if (arg !== "" && !NEEDS_QUOTES.test(arg)) return arg;
  return `"${arg.replace(/[\\"]/g, (ch) => `\\${ch}`)}"`;
}

export function formatArgv(argv: string[]): string {
  return argv.map(quoteArg).join(" ");
}

/**
 * Split a shell-like command line on whitespace, honouring single quotes,
 * double quotes and backslash escapes. Returns undefined for an unterminated quote.
 */
export function splitCommand(text: string): string[] | undefined {
  const args: string[] = [];
  let current = "";
  let inArg = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === "\\" && quote === '"' && i + 1 < text.length) {
        current += text[++i];
      } else {
        current += ch;
      }
      continue;
    }

    if (/\s/.test(ch)) {
      if (inArg) args.push(current);
      current = "";
      inArg = false;
      continue;
    }

    inArg = true;
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "\\" && i + 1 < text.length) {
      current += text[++i];
    } else {
      current += ch;
    }
  }

  if (quote) return undefined;
  if (inArg) args.push(current);
  return args;
}
