/**
 * Sections of an INI document, keyed by section name then option name.
 */
export type IniSections = Record<string, Record<string, string>>;

const SECTION_PATTERN = /^\[([^\]]+)\]$/;
const OPTION_PATTERN = /^([^=:]+?)\s*[=:]\s*(.*)$/;

/**
 * Parses the INI dialect written by the cloud SDK's `config set`.
 *
 * Handles `[section]` headers, `key = value` and `key: value` options, and
 * full-line `#` or `;` comments. Option names are lower-cased; values are
 * trimmed. Options before the first section header and lines that are not
 * options are ignored.
 * @param content - Raw file contents
 * @returns Parsed sections
 * @internal
 */
export function parseIni(content: string): IniSections {
  const sections: IniSections = {};
  let current: Record<string, string> | undefined;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }

    const section = SECTION_PATTERN.exec(line);
    if (section) {
      const name = section[1].trim();
      current = sections[name] ?? {};
      sections[name] = current;
      continue;
    }

    const option = OPTION_PATTERN.exec(line);
    if (option && current) {
      current[option[1].toLowerCase()] = option[2].trim();
    }
  }

  return sections;
}
