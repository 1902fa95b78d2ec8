import { isLeafEvent, type LeafEvent, type Music, type PostEventKind } from '../core/ast.js';
import { musicChildren } from '../core/music-children.js';
import type { SpanKind, SpanPosition, ValidationError } from './validation-errors.js';

interface SpanMarker {
  span: SpanKind;
  opens: boolean;
}

/**
 * Post-events that open or close a span. Ties, dynamics, articulations,
 * fingerings, string numbers and tremolos do not take part.
 */
const SPAN_MARKERS: Partial<Record<PostEventKind, SpanMarker>> = {
  slurStart: { span: 'slur', opens: true },
  slurEnd: { span: 'slur', opens: false },
  phrasingSlurStart: { span: 'phrasingSlur', opens: true },
  phrasingSlurEnd: { span: 'phrasingSlur', opens: false },
  beamStart: { span: 'beam', opens: true },
  beamEnd: { span: 'beam', opens: false },
  crescendo: { span: 'hairpin', opens: true },
  decrescendo: { span: 'hairpin', opens: true },
  hairpinEnd: { span: 'hairpin', opens: false }
};

const SPAN_ORDER: readonly SpanKind[] = ['slur', 'phrasingSlur', 'beam', 'hairpin'];

/** Leaf events of `music` in document order, descending through every wrapper. */
export function flattenLeafEvents(music: Music): LeafEvent[] {
  const events: LeafEvent[] = [];
  const pending: Music[] = [music];
  for (let node = pending.pop(); node; node = pending.pop()) {
    if (isLeafEvent(node)) {
      events.push(node);
    } else {
      for (const child of [...musicChildren(node)].reverse()) {
        pending.push(child);
      }
    }
  }
  return events;
}

function unmatched(span: SpanKind, position: SpanPosition): ValidationError {
  switch (span) {
    case 'slur':
      return { kind: 'unmatchedSlur', ...position };
    case 'phrasingSlur':
      return { kind: 'unmatchedPhrasingSlur', ...position };
    case 'beam':
      return { kind: 'unmatchedBeam', ...position };
    case 'hairpin':
      return { kind: 'unmatchedHairpin', ...position };
  }
}

/**
 * Scan one music root left to right with a stack per span kind.
 * Orphan ends are reported where they occur, dangling starts once the scan ends.
 */
export function checkSpanBalance(music: Music): ValidationError[] {
  const errors: ValidationError[] = [];
  const open: Record<SpanKind, number[]> = { slur: [], phrasingSlur: [], beam: [], hairpin: [] };

  flattenLeafEvents(music).forEach((event, index) => {
    for (const postEvent of event.postEvents) {
      const marker = SPAN_MARKERS[postEvent.kind];
      if (!marker) {
        continue;
      }
      if (marker.opens) {
        open[marker.span].push(index);
      } else if (open[marker.span].pop() === undefined) {
        errors.push(unmatched(marker.span, { endIndex: index }));
      }
    }
  });

  for (const span of SPAN_ORDER) {
    for (const startIndex of open[span]) {
      errors.push(unmatched(span, { startIndex }));
    }
  }
  return errors;
}
