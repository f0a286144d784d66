/**
 * Markdown → Zim markup conversion, as a capability the importer is handed.
 * The production implementation shells out to pandoc; tests pass a fake.
 */

/** A named, versioned set of converter options. */
export interface ConversionProfile {
  name: string;
  version: number;
  from: string;
  to: string;
  extraArgs: readonly string[];
}

/**
 * Smart punctuation off (the notes already contain what the author typed),
 * lists allowed directly after a paragraph, YAML blocks recognised so a stray
 * header never leaks into the body.
 */
export const ZIM_PROFILE: ConversionProfile = {
  name: 'zimwiki',
  version: 1,
  from: 'markdown-smart+lists_without_preceding_blankline+yaml_metadata_block',
  to: 'zimwiki',
  extraArgs: ['--wrap=preserve'],
};

export interface MarkupConverter {
  /** Resolves with the converted body; rejects with a ConversionError. */
  convert(body: string, profile?: ConversionProfile): Promise<string>;
}

export function profileLabel(profile: ConversionProfile): string {
  return `${profile.name}/v${profile.version}`;
}
