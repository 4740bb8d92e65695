/**
 * YAML helper — wraps the `yaml` package for config parsing.
 */

import YAML from 'yaml';

/** Parse YAML, naming the source file when it is malformed. */
export function parse(input: string, source = 'YAML input'): unknown {
  try {
    return YAML.parse(input);
  } catch (error) {
    throw new Error(`Could not parse ${source}`, { cause: error });
  }
}
