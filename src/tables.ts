/**
 * Lookup tables for the decoding DFA.
 *
 * The tables are derived from two small rule sets: which bytes belong to which
 * class, and which (state, class) pairs are legal. Everything not listed as
 * legal goes to RUNE_REJECT. Tables are built once when this module loads and
 * are never written to afterwards.
 */

import { ByteClass, RUNE_ACCEPT, RUNE_REJECT } from "./types";
import type { DfaState, DfaTables } from "./types";

/** Expecting one more continuation byte of any kind. */
export const STATE_NEED1: DfaState = 24;
/** Expecting two more continuation bytes of any kind. */
export const STATE_NEED2: DfaState = 36;
/** After 0xE0: next byte must be 0xA0..0xBF. */
export const STATE_AFTER_E0: DfaState = 48;
/** After 0xED: next byte must be 0x80..0x9F. */
export const STATE_AFTER_ED: DfaState = 60;
/** After 0xF0: next byte must be 0x90..0xBF. */
export const STATE_AFTER_F0: DfaState = 72;
/** After 0xF1..0xF3: three continuation bytes of any kind. */
export const STATE_AFTER_F1_F3: DfaState = 84;
/** After 0xF4: next byte must be 0x80..0x8F. */
export const STATE_AFTER_F4: DfaState = 96;

/**
 * Every state the DFA can be in, in ascending order.
 */
export const DFA_STATES: readonly DfaState[] = [
  RUNE_ACCEPT,
  RUNE_REJECT,
  STATE_NEED1,
  STATE_NEED2,
  STATE_AFTER_E0,
  STATE_AFTER_ED,
  STATE_AFTER_F0,
  STATE_AFTER_F1_F3,
  STATE_AFTER_F4,
];

const MAX_STATE = STATE_AFTER_F4;

interface ByteRange {
  from: number;
  to: number;
  cls: ByteClass;
}

type TransitionRule = readonly [classes: readonly ByteClass[], next: DfaState];

const ANY_CONTINUATION = [ByteClass.ContLow, ByteClass.ContMid, ByteClass.ContHigh] as const;

const UTF8_RANGES: readonly ByteRange[] = [
  { from: 0x00, to: 0x7f, cls: ByteClass.Ascii },
  { from: 0x80, to: 0x8f, cls: ByteClass.ContLow },
  { from: 0x90, to: 0x9f, cls: ByteClass.ContMid },
  { from: 0xa0, to: 0xbf, cls: ByteClass.ContHigh },
  { from: 0xc0, to: 0xc1, cls: ByteClass.Invalid },
  { from: 0xc2, to: 0xdf, cls: ByteClass.Lead2 },
  { from: 0xe0, to: 0xe0, cls: ByteClass.Lead3E0 },
  { from: 0xe1, to: 0xec, cls: ByteClass.Lead3 },
  { from: 0xed, to: 0xed, cls: ByteClass.Lead3Ed },
  { from: 0xee, to: 0xef, cls: ByteClass.Lead3 },
  { from: 0xf0, to: 0xf0, cls: ByteClass.Lead4F0 },
  { from: 0xf1, to: 0xf3, cls: ByteClass.Lead4 },
  { from: 0xf4, to: 0xf4, cls: ByteClass.Lead4F4 },
  { from: 0xf5, to: 0xff, cls: ByteClass.Invalid },
];

// Encoded surrogates are ordinary 3-byte sequences.
const WTF8_RANGES: readonly ByteRange[] = [
  ...UTF8_RANGES,
  { from: 0xed, to: 0xed, cls: ByteClass.Lead3 },
];

// HT, LF and CR stay ASCII.
const TEXT_RANGES: readonly ByteRange[] = [
  ...UTF8_RANGES,
  { from: 0x00, to: 0x08, cls: ByteClass.Control },
  { from: 0x0b, to: 0x0c, cls: ByteClass.Control },
  { from: 0x0e, to: 0x1f, cls: ByteClass.Control },
  { from: 0x7f, to: 0x7f, cls: ByteClass.Control },
];

const TRANSITION_RULES: ReadonlyMap<DfaState, readonly TransitionRule[]> = new Map<
  DfaState,
  readonly TransitionRule[]
>([
  [
    RUNE_ACCEPT,
    [
      [[ByteClass.Ascii], RUNE_ACCEPT],
      [[ByteClass.Lead2], STATE_NEED1],
      [[ByteClass.Lead3], STATE_NEED2],
      [[ByteClass.Lead3E0], STATE_AFTER_E0],
      [[ByteClass.Lead3Ed], STATE_AFTER_ED],
      [[ByteClass.Lead4F0], STATE_AFTER_F0],
      [[ByteClass.Lead4], STATE_AFTER_F1_F3],
      [[ByteClass.Lead4F4], STATE_AFTER_F4],
    ],
  ],
  [RUNE_REJECT, []],
  [STATE_NEED1, [[ANY_CONTINUATION, RUNE_ACCEPT]]],
  [STATE_NEED2, [[ANY_CONTINUATION, STATE_NEED1]]],
  [STATE_AFTER_E0, [[[ByteClass.ContHigh], STATE_NEED1]]],
  [STATE_AFTER_ED, [[[ByteClass.ContLow, ByteClass.ContMid], STATE_NEED1]]],
  [STATE_AFTER_F0, [[[ByteClass.ContMid, ByteClass.ContHigh], STATE_NEED2]]],
  [STATE_AFTER_F1_F3, [[ANY_CONTINUATION, STATE_NEED2]]],
  [STATE_AFTER_F4, [[[ByteClass.ContLow], STATE_NEED2]]],
]);

function maskFor(cls: ByteClass): number {
  switch (cls) {
    case ByteClass.Ascii:
      return 0x7f;
    case ByteClass.Lead2:
      return 0x1f;
    case ByteClass.Lead3:
    case ByteClass.Lead3E0:
    case ByteClass.Lead3Ed:
      return 0x0f;
    case ByteClass.Lead4:
    case ByteClass.Lead4F0:
    case ByteClass.Lead4F4:
      return 0x07;
    default:
      return 0;
  }
}

function lengthFor(cls: ByteClass): number {
  switch (cls) {
    case ByteClass.Lead2:
      return 2;
    case ByteClass.Lead3:
    case ByteClass.Lead3E0:
    case ByteClass.Lead3Ed:
      return 3;
    case ByteClass.Lead4:
    case ByteClass.Lead4F0:
    case ByteClass.Lead4F4:
      return 4;
    default:
      return 1;
  }
}

function buildByteClasses(ranges: readonly ByteRange[]): Uint8Array {
  const table = new Uint8Array(256).fill(ByteClass.Invalid);
  // Later ranges override earlier ones.
  for (const { from, to, cls } of ranges) {
    table.fill(cls, from, to + 1);
  }
  return table;
}

function nextState(state: DfaState, cls: ByteClass): DfaState {
  for (const [classes, next] of TRANSITION_RULES.get(state) ?? []) {
    if (classes.includes(cls)) {
      return next;
    }
  }
  return RUNE_REJECT;
}

/**
 * Builds the transition table for `classCount` classes.
 *
 * With more than STATE_STRIDE classes, the extra columns of one state share
 * slots with the first columns of the next state. The builder refuses any
 * such overlap that would need two different values.
 */
function buildTransitions(classCount: number): Uint8Array {
  const size = MAX_STATE + classCount;
  const table = new Uint8Array(size);
  const owner = new Int16Array(size).fill(-1);

  for (const state of DFA_STATES) {
    for (let cls = 0; cls < classCount; cls++) {
      const index = state + cls;
      const next = nextState(state, cls);
      if (owner[index] !== -1 && table[index] !== next) {
        throw new Error(
          `Transition slot ${index} claimed by state ${owner[index]} and state ${state}`
        );
      }
      table[index] = next;
      owner[index] = state;
    }
  }

  return table;
}

function buildTables(
  name: string,
  ranges: readonly ByteRange[],
  classCount: number,
  asciiStart: number,
  asciiEnd: number
): DfaTables {
  const classMask = new Uint8Array(classCount);
  const sequenceLength = new Uint8Array(classCount);
  for (let cls = 0; cls < classCount; cls++) {
    classMask[cls] = maskFor(cls);
    sequenceLength[cls] = lengthFor(cls);
  }

  return Object.freeze({
    name,
    byteClass: Object.freeze(Array.from(buildByteClasses(ranges))),
    classMask: Object.freeze(Array.from(classMask)),
    sequenceLength: Object.freeze(Array.from(sequenceLength)),
    transition: Object.freeze(Array.from(buildTransitions(classCount))),
    classCount,
    asciiStart,
    asciiEnd,
  });
}

/**
 * Strict UTF-8 (RFC 3629).
 */
export const UTF8_TABLES: DfaTables = buildTables("utf8", UTF8_RANGES, 12, 0x00, 0x80);

/**
 * WTF-8: UTF-8 that also admits encoded surrogate code points (U+D800..U+DFFF).
 */
export const WTF8_TABLES: DfaTables = buildTables("wtf8", WTF8_RANGES, 12, 0x00, 0x80);

/**
 * UTF-8 restricted to text: C0 controls other than HT, LF and CR, and DEL, are
 * rejected wherever they appear.
 */
export const TEXT_TABLES: DfaTables = buildTables("text", TEXT_RANGES, 13, 0x20, 0x7f);
