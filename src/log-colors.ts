import stripAnsi from 'strip-ansi';

const BASIC_COLORS: Record<string, string> = {
  '30': '#000000',
  '31': '#ff0000',
  '32': '#00ff00',
  '33': '#ffaa00',
  '34': '#5555ff',
  '35': '#ff55ff',
  '36': '#55ffff',
  '37': '#ffffff',
};

const PALETTE_16 = [
  '#000000', '#800000', '#008000', '#808000',
  '#000080', '#800080', '#008080', '#c0c0c0',
  '#808080', '#ff0000', '#00ff00', '#ffff00',
  '#0000ff', '#ff00ff', '#00ffff', '#ffffff',
];

function hex(value: number): string {
  return Math.max(0, Math.min(255, value)).toString(16).padStart(2, '0');
}

/** Foreground colour left in effect by the SGR sequences of `line`, if any. */
export function detectAnsiColor(line: string): string | null {
  const sgr = /\x1b\[([\d;]*)m/g;
  let match: RegExpExecArray | null;
  let color: string | null = null;

  while ((match = sgr.exec(line)) !== null) {
    const codes = match[1].split(';');
    const code = codes[0];

    if (code === '' || code === '0' || code === '39') {
      color = null;
    } else if (code in BASIC_COLORS) {
      color = BASIC_COLORS[code];
    } else if (/^9[0-7]$/.test(code)) {
      color = BASIC_COLORS[`3${code[1]}`];
    } else if (code === '38' && codes[1] === '5' && codes[2] !== undefined) {
      color = PALETTE_16[parseInt(codes[2], 10)] ?? color;
    } else if (code === '38' && codes[1] === '2' && codes.length >= 5) {
      color = `#${hex(parseInt(codes[2], 10))}${hex(parseInt(codes[3], 10))}${hex(parseInt(codes[4], 10))}`;
    }
  }

  return color;
}

export interface StyledLine {
  text: string;
  color: string;
}

export function styleLogLine(line: string): StyledLine {
  const text = stripAnsi(line);

  if (text.startsWith('✓')) {
    return { text, color: '#00ff00' };
  }
  if (text.startsWith('✗') || text.startsWith('[ERROR]')) {
    return { text, color: '#ff5555' };
  }
  if (text.startsWith('[WARNING]')) {
    return { text, color: '#ffaa00' };
  }
  return { text, color: detectAnsiColor(line) ?? '#d7d7d7' };
}
