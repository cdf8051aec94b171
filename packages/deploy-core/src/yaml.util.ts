import { parse as parseYamlImpl, stringify as stringifyYamlImpl } from 'yaml';

/** Parsed document; callers validate the shape. */
export function parseYaml(text: string): unknown {
  return parseYamlImpl(text);
}

export function stringifyYaml(input: unknown): string {
  const out = stringifyYamlImpl(input, {
    indent: 2,
    sortMapEntries: false,
    lineWidth: 0,
  });
  return out.endsWith('\n') ? out : `${out}\n`;
}
