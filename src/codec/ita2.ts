/**
 * ITA2 (International Telegraph Alphabet No. 2) codec
 *
 * Symbol value = teleprinter impulses 1..5, impulse 1 as bit 0.
 * Two shift states; the encoder starts in LETTERS without sending LTRS
 * and emits FIGS/LTRS only when a character needs the other shift.
 * NUL, LF, space and CR are the same in both shifts.
 *
 * National-use figure positions F, G and H are filled as '!', '&' and '#'.
 * WRU (figure D) and BELL (figure J) decode to ENQ and BEL.
 */
import { EncodingError } from '../lib/errors.js';
import { validateMessage, type Message } from '../cipher/transform.js';

export const FIGS = 27;
export const LTRS = 31;

type Shift = 'letters' | 'figures';

// Indexed by symbol; '_' marks the shift codes
const LETTERS = '\0E\nA SIU\rDRJNFCKTZLWHYPQOBG_MXV_';
const FIGURES = "\x003\n- '87\r\x054\x07,!:(5+)2#6019?&_./=_";

interface CodeEntry {
  code: number;
  shift: Shift | 'both';
}

const ENCODE_TABLE: ReadonlyMap<string, CodeEntry> = buildEncodeTable();

function buildEncodeTable(): Map<string, CodeEntry> {
  const table = new Map<string, CodeEntry>();
  for (let code = 0; code < LETTERS.length; code++) {
    if (code === FIGS || code === LTRS) continue;
    const letter = LETTERS[code];
    const figure = FIGURES[code];
    if (letter === figure) {
      table.set(letter, { code, shift: 'both' });
    } else {
      table.set(letter, { code, shift: 'letters' });
      table.set(figure, { code, shift: 'figures' });
    }
  }
  return table;
}

export interface EncodeTextOptions {
  // Character used in place of any character ITA2 cannot express
  substitute?: string;
}

/**
 * Text -> ITA2 symbols. Lower case is folded to upper case one character
 * at a time; a character whose upper case is not a single ITA2 character
 * (such as 'ß') has no code.
 */
export function encodeText(text: string, options: EncodeTextOptions = {}): number[] {
  const symbols: number[] = [];
  let shift: Shift = 'letters';
  let index = 0;

  for (const ch of text) {
    let entry = lookup(ch);

    if (entry === undefined) {
      if (options.substitute === undefined) {
        throw new EncodingError(`Character ${JSON.stringify(ch)} at index ${index} has no ITA2 code`);
      }
      entry = lookup(options.substitute);
      if (entry === undefined) {
        throw new EncodingError(`Substitute character ${JSON.stringify(options.substitute)} has no ITA2 code`);
      }
    }

    if (entry.shift !== 'both' && entry.shift !== shift) {
      symbols.push(entry.shift === 'figures' ? FIGS : LTRS);
      shift = entry.shift;
    }
    symbols.push(entry.code);
    index++;
  }

  return symbols;
}

/**
 * ITA2 symbols -> text. Shift codes change state and produce no character.
 */
export function decodeSymbols(symbols: Message): string {
  validateMessage(symbols);

  let shift: Shift = 'letters';
  let text = '';

  for (const code of symbols) {
    if (code === FIGS) {
      shift = 'figures';
    } else if (code === LTRS) {
      shift = 'letters';
    } else {
      text += (shift === 'letters' ? LETTERS : FIGURES)[code];
    }
  }

  return text;
}

/**
 * True if every character of `text` has an ITA2 code
 */
export function isEncodable(text: string): boolean {
  for (const ch of text) {
    if (lookup(ch) === undefined) return false;
  }
  return true;
}

function lookup(ch: string): CodeEntry | undefined {
  return ENCODE_TABLE.get(ch.toUpperCase());
}
