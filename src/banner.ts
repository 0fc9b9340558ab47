const INNER_WIDTH = 46;

function boxLine(text: string): string {
  return `  ║  ${text.padEnd(INNER_WIDTH - 2)}║`;
}

/** Startup box; every row is padded to the same width whatever the port. */
export function formatBanner(port: number): string {
  const rule = '═'.repeat(INNER_WIDTH);
  return [
    `  ╔${rule}╗`,
    boxLine('Activity Sign-ups'),
    boxLine(`http://localhost:${port}`),
    boxLine(''),
    boxLine('GET    /activities'),
    boxLine('POST   /activities/:name/signup?email='),
    boxLine('DELETE /activities/:name/participants/:email'),
    `  ╚${rule}╝`,
  ].join('\n');
}
