import type {
  Diagnostic,
  DiagnosticSeverity,
} from "../diagnostics/index.js";

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  pointer: (severity: DiagnosticSeverity, text: string) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

const BYTES_PER_ROW = 16;
const MAX_ROWS = 4;
const GUTTER_WIDTH = 8;

const clampIndex = (value: number, max: number): number => {
  if (value < 0) return 0;
  if (value > max) return max;
  return value;
};

const hexByte = (byte: number) => byte.toString(16).padStart(2, "0");

const colorForSeverity = (
  severity: DiagnosticSeverity
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      pointer: (_severity, text) => text,
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) =>
      bold(colorForSeverity(severity)(severity.toUpperCase())),
    pointer: (severity, text) => colorForSeverity(severity)(text),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

/**
 * Hex dump of the rows around the span, with `^^` under every byte the span
 * covers. An empty span marks the byte it starts at.
 */
const formatExcerpt = ({
  diagnostic,
  bytes,
  color,
}: {
  diagnostic: Diagnostic;
  bytes: Uint8Array;
  color: Colorizer;
}): string | undefined => {
  if (bytes.length === 0) return undefined;

  const { start, end } = diagnostic.span;
  const first = clampIndex(start, bytes.length - 1);
  const last = clampIndex(Math.max(end - 1, start), bytes.length - 1);
  const firstRow = Math.floor(first / BYTES_PER_ROW);
  const lastRow = Math.min(Math.floor(last / BYTES_PER_ROW), firstRow + MAX_ROWS - 1);
  const padding = " ".repeat(GUTTER_WIDTH);
  const severity = diagnostic.severity ?? "error";
  const lines = [`${padding} |`];

  for (let row = firstRow; row <= lastRow; row += 1) {
    const rowStart = row * BYTES_PER_ROW;
    const rowBytes = Array.from(bytes.subarray(rowStart, rowStart + BYTES_PER_ROW));
    const gutter = rowStart.toString(16).padStart(GUTTER_WIDTH, "0");
    lines.push(`${gutter} | ${rowBytes.map(hexByte).join(" ")}`);

    const marks = rowBytes
      .map((_, index) => {
        const offset = rowStart + index;
        return offset >= first && offset <= last ? "^^" : "  ";
      })
      .join(" ")
      .trimEnd();
    const message = row === lastRow ? ` ${color.muted(diagnostic.message)}` : "";
    lines.push(`${padding} | ${color.pointer(severity, marks)}${message}`);
  }

  return lines.join("\n");
};

export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { color?: boolean; bytes?: Uint8Array } = {}
): string => {
  const color = createColorizer(options.color ?? true);
  const { span } = diagnostic;
  const location = `${span.file}:${span.start}-${span.end}`;
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const header = `${location} ${color.severityLabel(
    diagnostic.severity ?? "error"
  )}${phase} ${color.accent(diagnostic.code)}: ${diagnostic.message}`;
  const excerpt = options.bytes
    ? formatExcerpt({ diagnostic, bytes: options.bytes, color })
    : undefined;
  const hints = (diagnostic.hints ?? []).map(
    (hint) => `${" ".repeat(GUTTER_WIDTH)} = hint: ${hint.message}`
  );

  return [header, excerpt, ...hints].filter(Boolean).join("\n");
};
