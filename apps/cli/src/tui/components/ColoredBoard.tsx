import React from "react";
import { Box, Text } from "ink";
import { colors } from "../theme.js";

/**
 * Maps CSS classes from a variant's renderBoard() output to terminal colors.
 */
const CLASS_STYLES: Record<string, { color?: string; bold?: boolean; inverse?: boolean }> = {
  "ttt-x": { color: colors.cyan },
  "ttt-o": { color: colors.secondary },
  "ttt-cursor": { color: colors.primary, bold: true, inverse: true },
};

interface Segment {
  text: string;
  color?: string;
  bold?: boolean;
  inverse?: boolean;
}

export function parseSegments(line: string): Segment[] {
  const segments: Segment[] = [];
  const regex = /<span class="([^"]*)">(.*?)<\/span>/g;
  let lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(line)) !== null) {
    if (match.index > lastIndex) {
      segments.push({ text: line.slice(lastIndex, match.index) });
    }

    const segment: Segment = { text: match[2] };
    for (const cls of match[1].split(/\s+/)) {
      const style = CLASS_STYLES[cls];
      if (style) {
        if (style.color) segment.color = style.color;
        if (style.bold) segment.bold = true;
        if (style.inverse) segment.inverse = true;
      }
    }

    segments.push(segment);
    lastIndex = match.index + match[0].length;
  }

  if (lastIndex < line.length) {
    segments.push({ text: line.slice(lastIndex) });
  }

  return segments;
}

/**
 * Renders board markup (with <span class="..."> tags) as colored Ink text.
 * Falls back to plain text for any content without spans.
 */
export function ColoredBoard({ html }: { html: string }) {
  const lines = html.split("\n");

  return (
    <Box flexDirection="column">
      {lines.map((line, i) => {
        const segments = parseSegments(line);
        return (
          <Text key={i}>
            {segments.map((seg, j) => (
              <Text key={j} color={seg.color} bold={seg.bold} inverse={seg.inverse}>
                {seg.text}
              </Text>
            ))}
          </Text>
        );
      })}
    </Box>
  );
}
