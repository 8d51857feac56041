import { describe, expect, it } from 'vitest';

import { DeprecationCommentError, DeprecationConflictError } from '../../src/core/errors.js';
import { classifyNote, classifySymbols, findDeprecation, isSafeFileName } from '../../src/notes/classify.js';
import { createNotesContext } from '../../src/notes/notes-context.js';
import { parseRegistry } from '../../src/parser/parse-registry.js';

function registryOf(body: string) {
  return parseRegistry(`<registry>${body}</registry>`, 'test.xml');
}

describe('classifyNote', () => {
  it('maps every introduction and deprecation combination', () => {
    expect(classifyNote('1.0')).toEqual({ kind: 'always-present' });
    expect(classifyNote('1.0', '1.2')).toEqual({ kind: 'deprecated', deprecatedBy: '1.2' });
    expect(classifyNote('2.1')).toEqual({ kind: 'added', addedIn: '2.1' });
    expect(classifyNote('1.1', '2.0')).toEqual({ kind: 'added-deprecated', addedIn: '1.1', deprecatedBy: '2.0' });
    expect(classifyNote('cl_khr_fp64')).toEqual({ kind: 'extension', extension: 'cl_khr_fp64' });
  });

  it('uses the container type for extensions without the cl_ prefix', () => {
    expect(classifyNote('cles_khr_int64', undefined, 'extension')).toEqual({
      kind: 'extension',
      extension: 'cles_khr_int64'
    });
    expect(classifyNote('cles_khr_int64')).toEqual({ kind: 'added', addedIn: 'cles_khr_int64' });
  });

  it('documents a cles_ extension as a requirement', () => {
    const registry = registryOf(`
      <extension name="cles_khr_int64"><require><command name="clInt64KHR"/></require></extension>`);

    const result = classifySymbols(registry, 'command', createNotesContext());

    expect(result.symbols[0]?.container.type).toBe('extension');
    expect(result.stats.newerThanBaseline).toBe(1);
  });

  it('never attaches deprecation to an extension', () => {
    expect(classifyNote('cl_khr_fp64', '3.0')).toEqual({ kind: 'extension', extension: 'cl_khr_fp64' });
  });
});

describe('findDeprecation', () => {
  it('takes the trailing token of a deprecation comment', () => {
    const registry = registryOf(`
      <feature number="1.0">
        <require comment="Deprecated OpenCL 1.1 APIs, deprecated in OpenCL 1.2">
          <command name="clEnqueueMarker"/>
        </require>
      </feature>`);

    expect(findDeprecation(registry, 'command', 'clEnqueueMarker')).toBe('1.2');
  });

  it('ignores comments without the deprecation marker', () => {
    const registry = registryOf(`
      <feature number="1.0">
        <require comment="Platform APIs"><command name="clGetPlatformIDs"/></require>
      </feature>`);

    expect(findDeprecation(registry, 'command', 'clGetPlatformIDs')).toBeUndefined();
  });

  it('throws a DeprecationConflictError with both groups attached', () => {
    const registry = registryOf(`
      <feature number="1.0">
        <require comment="Old enums, deprecated in OpenCL 2.0"><enum name="CL_OLD"/></require>
        <require comment="Older enums, deprecated in OpenCL 3.0"><enum name="CL_OLD"/></require>
      </feature>`);

    let caught: unknown;
    try {
      findDeprecation(registry, 'enum', 'CL_OLD');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DeprecationConflictError);
    if (!(caught instanceof DeprecationConflictError)) {
      return;
    }
    expect(caught.symbolName).toBe('CL_OLD');
    expect(caught.kind).toBe('enum');
    expect(caught.groups.map((group) => group.comment)).toEqual([
      'Old enums, deprecated in OpenCL 2.0',
      'Older enums, deprecated in OpenCL 3.0'
    ]);
    expect(caught.groups.map((group) => group.node.path)).toEqual([
      '/registry[1]/feature[1]/require[1]',
      '/registry[1]/feature[1]/require[2]'
    ]);
  });

  it('rejects a marker that is not followed by exactly one version token', () => {
    const registry = registryOf(`
      <feature number="1.0">
        <require comment="Enums deprecated in OpenCL 2.0 and later"><enum name="CL_OLD"/></require>
      </feature>`);

    expect(() => findDeprecation(registry, 'enum', 'CL_OLD')).toThrow(DeprecationCommentError);
  });
});

describe('classifySymbols', () => {
  it('resolves features before extensions and warns about the extension copy', () => {
    const registry = registryOf(`
      <extensions>
        <extension name="cl_khr_depth_images">
          <require><enum name="CL_DEPTH"/></require>
        </extension>
      </extensions>
      <feature number="2.0">
        <require><enum name="CL_DEPTH"/></require>
      </feature>`);
    const ctx = createNotesContext('test.xml');

    const result = classifySymbols(registry, 'enum', ctx);

    expect(result.symbols.map((symbol) => [symbol.name, symbol.addedIn])).toEqual([['CL_DEPTH', '2.0']]);
    expect(ctx.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
      'CORE_EXTENSION_COLLISION',
      'SYMBOL_SUMMARY'
    ]);
    expect(ctx.diagnostics[0]?.severity).toBe('warning');
    expect(ctx.diagnostics[0]?.xmlPath).toBe('/registry[1]/extensions[1]/extension[1]/require[1]/enum[1]');
    expect(ctx.diagnostics[0]?.source?.name).toBe('test.xml');
  });

  it('keeps the first of two extensions in declaration order', () => {
    const registry = registryOf(`
      <extension name="cl_ext_b"><require><command name="clSharedEXT"/></require></extension>
      <extension name="cl_ext_a"><require><command name="clSharedEXT"/></require></extension>`);
    const ctx = createNotesContext();

    const result = classifySymbols(registry, 'command', ctx);

    expect(result.symbols.map((symbol) => symbol.addedIn)).toEqual(['cl_ext_b']);
    expect(ctx.diagnostics[0]?.code).toBe('DUPLICATE_SYMBOL');
    expect(ctx.diagnostics[0]?.message).toBe(
      'clSharedEXT is required by both extension cl_ext_b and extension cl_ext_a; only extension cl_ext_b is noted'
    );
  });

  it('keeps the earlier of two core versions', () => {
    const registry = registryOf(`
      <feature number="1.1"><require><command name="clTwice"/></require></feature>
      <feature number="1.2"><require><command name="clTwice"/></require></feature>`);
    const ctx = createNotesContext();

    const result = classifySymbols(registry, 'command', ctx);

    expect(result.symbols.map((symbol) => symbol.addedIn)).toEqual(['1.1']);
    expect(result.stats).toEqual({ kind: 'command', visited: 2, newerThanBaseline: 1, deprecated: 0 });
  });

  it('ignores deprecation comments for extension symbols', () => {
    const registry = registryOf(`
      <extension name="cl_ext_gamma">
        <require comment="Gamma commands, deprecated in OpenCL 3.0"><command name="clGammaEXT"/></require>
      </extension>`);

    const result = classifySymbols(registry, 'command', createNotesContext());

    expect(result.symbols[0]?.addedIn).toBe('cl_ext_gamma');
    expect(result.symbols[0]?.deprecatedBy).toBeUndefined();
    expect(result.stats.deprecated).toBe(0);
  });

  it('skips unnamed entries with a warning', () => {
    const registry = registryOf(`
      <feature number="1.0"><require><command/><command name="clNamed"/></require></feature>`);
    const ctx = createNotesContext();

    const result = classifySymbols(registry, 'command', ctx);

    expect(result.symbols.map((symbol) => symbol.name)).toEqual(['clNamed']);
    expect(result.stats.visited).toBe(1);
    expect(ctx.diagnostics[0]?.code).toBe('SYMBOL_NAME_MISSING');
  });

  it('reports the summary line and forwards diagnostics to the listener', () => {
    const registry = registryOf(`
      <feature number="1.0">
        <require><enum name="CL_A"/></require>
        <require comment="Old enums, deprecated in OpenCL 2.0"><enum name="CL_B"/></require>
      </feature>
      <feature number="1.1"><require><enum name="CL_C"/></require></feature>`);
    const seen: string[] = [];
    const ctx = createNotesContext(undefined, (diagnostic) => seen.push(diagnostic.message));

    const result = classifySymbols(registry, 'enum', ctx);

    expect(result.stats).toEqual({ kind: 'enum', visited: 3, newerThanBaseline: 1, deprecated: 1 });
    expect(seen).toEqual(['Found 3 API enums, 1 newer than 1.0, 1 deprecated']);
  });

  it('keeps separate processed sets per kind', () => {
    const registry = registryOf(`
      <feature number="1.0">
        <require><command name="clFirst"/><enum name="CL_FIRST"/></require>
      </feature>
      <feature number="1.1">
        <require><command name="clFirst"/><enum name="CL_FIRST"/></require>
      </feature>`);
    const ctx = createNotesContext();

    expect(classifySymbols(registry, 'command', ctx).stats.visited).toBe(2);
    expect(classifySymbols(registry, 'enum', ctx).stats.visited).toBe(2);
    expect(ctx.diagnostics.filter((diagnostic) => diagnostic.code === 'DUPLICATE_SYMBOL')).toHaveLength(2);
  });

  it('skips names another kind already documented', () => {
    const registry = registryOf(`
      <feature number="1.0"><require><enum name="CL_SAME"/></require></feature>
      <feature number="2.0"><require><command name="CL_SAME"/></require></feature>`);
    const ctx = createNotesContext();

    const commands = classifySymbols(registry, 'command', ctx);
    const claimed = new Map(commands.symbols.map((symbol) => [symbol.name, symbol]));
    const enums = classifySymbols(registry, 'enum', ctx, claimed);

    expect(commands.symbols.map((symbol) => symbol.addedIn)).toEqual(['2.0']);
    expect(enums.symbols).toEqual([]);
    expect(ctx.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
      'SYMBOL_SUMMARY',
      'CROSS_KIND_COLLISION',
      'SYMBOL_SUMMARY'
    ]);
    expect(ctx.diagnostics[1]?.message).toBe(
      'CL_SAME is declared as both command and enum in the XML; only the command from version 2.0 is noted'
    );
  });

  it('warns once for every later occurrence of a name', () => {
    const registry = registryOf(`
      <feature number="1.1"><require><enum name="CL_SHARED"/></require></feature>
      <extension name="cl_khr_one"><require><enum name="CL_SHARED"/></require></extension>
      <extension name="cl_khr_two"><require><enum name="CL_SHARED"/></require></extension>
      <extension name="cl_khr_three"><require><enum name="CL_SHARED"/></require></extension>`);
    const ctx = createNotesContext();

    const result = classifySymbols(registry, 'enum', ctx);

    expect(result.symbols.map((symbol) => symbol.addedIn)).toEqual(['1.1']);
    expect(result.stats.visited).toBe(4);
    expect(ctx.diagnostics.map((diagnostic) => diagnostic.xmlPath)).toEqual([
      '/registry[1]/extension[1]/require[1]/enum[1]',
      '/registry[1]/extension[2]/require[1]/enum[1]',
      '/registry[1]/extension[3]/require[1]/enum[1]',
      undefined
    ]);
    expect(ctx.diagnostics.slice(0, 3).every((diagnostic) => diagnostic.code === 'CORE_EXTENSION_COLLISION')).toBe(
      true
    );
  });

  it('keeps the first of three extensions and warns about the other two', () => {
    const registry = registryOf(`
      <extension name="cl_ext_one"><require><command name="clTripleEXT"/></require></extension>
      <extension name="cl_ext_two"><require><command name="clTripleEXT"/></require></extension>
      <extension name="cl_ext_three"><require><command name="clTripleEXT"/></require></extension>`);
    const ctx = createNotesContext();

    const result = classifySymbols(registry, 'command', ctx);

    expect(result.symbols.map((symbol) => symbol.addedIn)).toEqual(['cl_ext_one']);
    expect(ctx.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      'clTripleEXT is required by both extension cl_ext_one and extension cl_ext_two; only extension cl_ext_one is noted',
      'clTripleEXT is required by both extension cl_ext_one and extension cl_ext_three; only extension cl_ext_one is noted',
      'Found 3 API commands, 1 newer than 1.0, 0 deprecated'
    ]);
  });

  it('skips names that would leave the output directory', () => {
    const registry = registryOf(`
      <feature number="1.0">
        <require>
          <command name="../escaped"/>
          <command name="nested/name"/>
          <command name="back\\slash"/>
          <command name=".."/>
          <command name="clSafe"/>
        </require>
      </feature>`);
    const ctx = createNotesContext();

    const result = classifySymbols(registry, 'command', ctx);

    expect(result.symbols.map((symbol) => symbol.name)).toEqual(['clSafe']);
    expect(result.stats.visited).toBe(1);
    expect(ctx.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
      'UNSAFE_SYMBOL_NAME',
      'UNSAFE_SYMBOL_NAME',
      'UNSAFE_SYMBOL_NAME',
      'UNSAFE_SYMBOL_NAME',
      'SYMBOL_SUMMARY'
    ]);
  });
});

describe('isSafeFileName', () => {
  it('accepts plain symbol names', () => {
    expect(isSafeFileName('clCreateBuffer')).toBe(true);
    expect(isSafeFileName('CL_..._VALUE')).toBe(true);
  });

  it('rejects separators and dot segments', () => {
    expect(isSafeFileName('../escaped')).toBe(false);
    expect(isSafeFileName('a/b')).toBe(false);
    expect(isSafeFileName('a\\b')).toBe(false);
    expect(isSafeFileName('.')).toBe(false);
    expect(isSafeFileName('..')).toBe(false);
  });
});
