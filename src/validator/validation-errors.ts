/** Which span a balance error refers to. */
export type SpanKind = 'slur' | 'phrasingSlur' | 'beam' | 'hairpin';

/**
 * Position of a balance error in the flattened leaf-event stream of one
 * music root: `startIndex` for a start never closed, `endIndex` for an end
 * with nothing open.
 */
export type SpanPosition = { startIndex: number; endIndex?: undefined } | { startIndex?: undefined; endIndex: number };

/** Structural problem found by `validate`; every one in a file is reported. */
export type ValidationError =
  | { kind: 'scoreNoMusic' }
  | { kind: 'invalidDurationBase'; base: number }
  | { kind: 'excessiveDots'; dots: number }
  | { kind: 'zeroMultiplierDenominator' }
  | { kind: 'unknownContextType'; name: string }
  | { kind: 'unknownClefName'; name: string }
  | { kind: 'unknownKeyMode'; mode: string }
  | { kind: 'invalidTimeNumerator'; value: number }
  | { kind: 'invalidTimeDenominator'; value: number }
  | { kind: 'emptyChord' }
  | ({ kind: 'unmatchedSlur' } & SpanPosition)
  | ({ kind: 'unmatchedPhrasingSlur' } & SpanPosition)
  | ({ kind: 'unmatchedBeam' } & SpanPosition)
  | ({ kind: 'unmatchedHairpin' } & SpanPosition)
  | { kind: 'unknownDynamic'; name: string }
  | { kind: 'invalidFingeringDigit'; digit: number }
  | { kind: 'invalidStringNumber'; number: number }
  | { kind: 'invalidTremoloType'; value: number }
  | { kind: 'invalidTupletFraction'; numerator: number; denominator: number }
  | { kind: 'invalidAfterGraceFraction'; numerator: number; denominator: number }
  | { kind: 'emptyGraceBody' }
  | { kind: 'invalidRepeatCount' }
  | { kind: 'emptyBarLineType' }
  | { kind: 'emptyLyricSyllable' }
  | { kind: 'emptyTempo' }
  | { kind: 'invalidTempoBpm' }
  | { kind: 'invalidTempoRange'; low: number; high: number };

export type ValidationErrorKind = ValidationError['kind'];

const SPAN_LABELS: Record<SpanKind, string> = {
  slur: 'slur',
  phrasingSlur: 'phrasing slur',
  beam: 'beam',
  hairpin: 'hairpin'
};

function describeSpan(span: SpanKind, position: SpanPosition): string {
  if (position.startIndex !== undefined) {
    return `${SPAN_LABELS[span]} opened at event ${position.startIndex} is never closed`;
  }
  return `${SPAN_LABELS[span]} closed at event ${position.endIndex} was never opened`;
}

/** Human-readable message for one validation error. */
export function formatValidationError(error: ValidationError): string {
  switch (error.kind) {
    case 'scoreNoMusic':
      return 'score block has no music';
    case 'invalidDurationBase':
      return `invalid duration base ${error.base}: must be a power of 2 (1..128)`;
    case 'excessiveDots':
      return `excessive dots (${error.dots}): at most 4 are allowed`;
    case 'zeroMultiplierDenominator':
      return 'duration multiplier denominator is zero';
    case 'unknownContextType':
      return `unknown context type '${error.name}'`;
    case 'unknownClefName':
      return `unknown clef name '${error.name}'`;
    case 'unknownKeyMode':
      return `unknown key mode '\\${error.mode}'`;
    case 'invalidTimeNumerator':
      return `invalid time signature numerator ${error.value}: must be positive`;
    case 'invalidTimeDenominator':
      return `invalid time signature denominator ${error.value}: must be a power of 2`;
    case 'emptyChord':
      return 'chord must contain at least one pitch';
    case 'unmatchedSlur':
      return describeSpan('slur', error);
    case 'unmatchedPhrasingSlur':
      return describeSpan('phrasingSlur', error);
    case 'unmatchedBeam':
      return describeSpan('beam', error);
    case 'unmatchedHairpin':
      return describeSpan('hairpin', error);
    case 'unknownDynamic':
      return `unknown dynamic marking '\\${error.name}'`;
    case 'invalidFingeringDigit':
      return `fingering digit ${error.digit} out of range (0-9)`;
    case 'invalidStringNumber':
      return `string number ${error.number} out of range (1-9)`;
    case 'invalidTremoloType':
      return `invalid tremolo type ${error.value}: must be 0 or a power of 2 >= 8`;
    case 'invalidTupletFraction':
      return `invalid tuplet fraction ${error.numerator}/${error.denominator}: both parts must be positive`;
    case 'invalidAfterGraceFraction':
      return `invalid afterGrace fraction ${error.numerator}/${error.denominator}: both parts must be positive`;
    case 'emptyGraceBody':
      return 'empty grace note body';
    case 'invalidRepeatCount':
      return 'invalid repeat count: must be positive';
    case 'emptyBarLineType':
      return 'empty bar line type';
    case 'emptyLyricSyllable':
      return 'empty lyric syllable';
    case 'emptyTempo':
      return 'tempo must have text or a metronome mark';
    case 'invalidTempoBpm':
      return 'tempo BPM must be positive';
    case 'invalidTempoRange':
      return `tempo BPM range: low (${error.low}) must be less than high (${error.high})`;
  }
}

/** Diagnostic code for a validation error kind, e.g. `LILYPOND_UNMATCHED_SLUR`. */
export function validationErrorCode(kind: ValidationErrorKind): string {
  return `LILYPOND_${kind.replace(/([A-Z])/g, '_$1').toUpperCase()}`;
}
