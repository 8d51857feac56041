import type { NoteClassification, SymbolKind, VersionSymbol } from '../core/registry.js';
import { classifyNote } from './classify.js';

/** Attribution block at the top of every generated note file. */
export const NOTE_HEADER = `// Copyright 2017-2023 The Khronos Group. This work is licensed under a
// Creative Commons Attribution 4.0 International License; see
// http://creativecommons.org/licenses/by/4.0/
`;

/** Trailer appended after the note sentence. */
export const NOTE_FOOTER = '\n';

/** Formatting policy: one sentence per note category. */
export type NoteFormatter = (name: string, classification: NoteClassification) => string;

/** Verbose form used on command reference pages. */
export const formatFullNote: NoteFormatter = (name, classification) => {
  switch (classification.kind) {
    case 'always-present':
      return `\n// Intentionally empty, ${name} has always been present.`;
    case 'deprecated':
      return `\nIMPORTANT: {${name}} is <<unified-spec, deprecated by>> version ${classification.deprecatedBy}.`;
    case 'added':
      return `\nIMPORTANT: {${name}} is <<unified-spec, missing before>> version ${classification.addedIn}.`;
    case 'added-deprecated':
      return (
        `\nIMPORTANT: {${name}} is <<unified-spec, missing before>> version ${classification.addedIn}` +
        ` and <<unified-spec, deprecated by>> version ${classification.deprecatedBy}.`
      );
    case 'extension':
      return `\nIMPORTANT: ${name} requires ${classification.extension}.`;
  }
};

/** Terse form used in enumerant tables. */
export const formatShortNote: NoteFormatter = (name, classification) => {
  switch (classification.kind) {
    case 'always-present':
      return `// Intentionally empty, ${name} has always been present.`;
    case 'deprecated':
      return `<<unified-spec, Deprecated by>> version ${classification.deprecatedBy}.`;
    case 'added':
      return `<<unified-spec, Missing before>> version ${classification.addedIn}.`;
    case 'added-deprecated':
      return (
        `<<unified-spec, Missing before>> version ${classification.addedIn}` +
        ` and <<unified-spec, deprecated by>> version ${classification.deprecatedBy}.`
      );
    case 'extension':
      return `${name} requires ${classification.extension}.`;
  }
};

/** Commands get the full form, enumerants the short one. */
export const NOTE_FORMATTERS: Record<SymbolKind, NoteFormatter> = {
  command: formatFullNote,
  enum: formatShortNote
};

/** Render the complete contents of one `<name>.asciidoc` file. */
export function renderNoteFile(symbol: VersionSymbol): string {
  const format = NOTE_FORMATTERS[symbol.kind];
  const note = format(symbol.name, classifyNote(symbol.addedIn, symbol.deprecatedBy, symbol.container.type));
  return `${NOTE_HEADER}${note}${NOTE_FOOTER}`;
}
