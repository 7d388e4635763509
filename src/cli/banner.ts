const BANNER = `
  ╔╦╗┬┌─┐┬┌─┌─┐┌┬┐  ╔╦╗┌─┐┌─┐┬┌─
   ║ ││  ├┴┐├┤  │    ║║├┤ └─┐├┴┐
   ╩ ┴└─┘┴ ┴└─┘ ┴   ═╩╝└─┘└─┘┴ ┴
`;

const TAGLINES = [
  "Find the show, skip the queue.",
  "Every seat has a story.",
  "Ask about any event.",
];

export function printBanner(version: string, write: (text: string) => void): void {
  const tagline = TAGLINES[Math.floor(Math.random() * TAGLINES.length)];
  write(`${BANNER}\n`);
  write(`  v${version} · ${tagline}\n\n`);
}
