import { DEFAULT_SECTION } from '../models/test-case';
import { cleanFieldText } from './field-markers';

export const SECTION_MARKER = 'TEST TYPE:';

// Marker must open its line; heading marks and bold markup may surround it
const SECTION_MARKER_PATTERN = '^[ \\t]*(?:#+[ \\t]*)?(?:\\*\\*)?TEST TYPE:(?:\\*\\*)?[ \\t]*(.*)$';

interface SectionMarker {
  label: string;
  start: number;
  end: number;
}

function findSectionMarkers(text: string, defaultSection: string): SectionMarker[] {
  const regex = new RegExp(SECTION_MARKER_PATTERN, 'gm');
  const markers: SectionMarker[] = [];

  let match: RegExpExecArray | null;
  while ((match = regex.exec(text)) !== null) {
    markers.push({
      label: cleanFieldText(match[1]) || defaultSection,
      start: match.index,
      end: match.index + match[0].length,
    });
  }

  return markers;
}

/**
 * Splits LLM output on `TEST TYPE: <label>` lines. Each label maps to the
 * trimmed text up to the next marker. A repeated label overwrites the
 * earlier content but keeps its position. Returns an empty map when the
 * text has no markers.
 */
export function splitSections(text: string, defaultSection: string = DEFAULT_SECTION): Map<string, string> {
  const sections = new Map<string, string>();
  const markers = findSectionMarkers(text, defaultSection);

  markers.forEach((marker, index) => {
    const next = markers[index + 1];
    const content = text.slice(marker.end, next ? next.start : text.length).trim();
    sections.set(marker.label, content);
  });

  return sections;
}
