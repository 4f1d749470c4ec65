import { decodeMarkup, dumpYaml, isCommentOnlyMarkup, stringToDict } from './markup';
import { mergeExtraVars } from './merge';
import { type ProcessExtraVarsOptions, resolveProcessOptions } from './options';
import type { IO } from './runtime';
import { type ExtraVars, FILE_REFERENCE_PREFIX, type SourceKind } from './types';

type LoadedSource = {
  kind: SourceKind;
  text: string;
  path?: string;
};

async function loadSource(source: string, baseDir: string, io: IO): Promise<LoadedSource> {
  if (!source.startsWith(FILE_REFERENCE_PREFIX)) {
    return { kind: 'inline', text: source };
  }

  const path = io.path.resolve(baseDir, source.slice(FILE_REFERENCE_PREFIX.length));
  // Read failures propagate as-is
  const text = await io.readText(path);
  return { kind: 'file', text, path };
}

function hasCommentLine(text: string): boolean {
  return text.split('\n').some((line) => line.startsWith('#'));
}

/**
 * Decode every source, merge the results, and serialize them as one string.
 *
 * Sources are inline text (YAML, JSON or `key=value` words) or `@path` file
 * references (YAML or JSON only). Later sources win; `_raw_params` accumulates.
 *
 * The output is compact JSON, or `""` when nothing was defined. With
 * `forceJson: false` the sources are instead concatenated as YAML, keeping
 * comments, whenever that text still decodes to a mapping.
 *
 * @throws {ExtraVarsParseError} when a source cannot be decoded
 */
export async function processExtraVars(
  sources: readonly string[],
  options?: ProcessExtraVarsOptions
): Promise<string> {
  const { forceJson, baseDir, io, onEvent } = resolveProcessOptions(options);

  let extraVars: ExtraVars = {};
  let yamlTrace = '';

  for (const [index, source] of sources.entries()) {
    const loaded = await loadSource(source, baseDir, io);
    const vars = stringToDict(loaded.text, loaded.kind === 'inline');

    // Comments would be lost by re-serializing, so keep the text verbatim
    if (hasCommentLine(loaded.text)) {
      yamlTrace += `${loaded.text}\n`;
    } else if (loaded.text !== '') {
      yamlTrace += `${dumpYaml(vars)}\n`;
    }

    extraVars = mergeExtraVars(extraVars, vars);

    const keys = Object.keys(vars);
    onEvent?.(
      loaded.path === undefined
        ? { type: 'sourceDecoded', index, kind: loaded.kind, keys }
        : { type: 'sourceDecoded', index, kind: loaded.kind, path: loaded.path, keys }
    );
  }

  if (!forceJson) {
    if (decodeMarkup(yamlTrace) !== undefined || isCommentOnlyMarkup(yamlTrace)) {
      onEvent?.({ type: 'formatDecided', format: 'yaml', message: 'Using unprocessed YAML' });
      return yamlTrace.trimEnd();
    }
    onEvent?.({
      type: 'formatDecided',
      format: 'json',
      message: 'Failed YAML parsing, defaulting to JSON'
    });
  }

  if (Object.keys(extraVars).length === 0) {
    return '';
  }
  return JSON.stringify(extraVars);
}
