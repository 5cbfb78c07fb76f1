import {
  MAX_DISAMBIGUATION_OPTION_LENGTH,
  MAX_DISAMBIGUATION_OPTIONS,
} from '../../config/constants';

/**
 * Pull candidate titles out of a disambiguation page's plain-text extract.
 * Only bullet lines count; each is cut at its first comma or spaced en dash.
 */
export function extractDisambiguationOptions(extract: string): string[] {
  const options: string[] = [];

  for (const line of extract.split('\n')) {
    if (!line.startsWith('*')) continue;

    const option = line
      .replace(/^[* ]+/, '')
      .split(',', 1)[0]
      .split(' – ', 1)[0]
      .trim();

    if (option && option.length < MAX_DISAMBIGUATION_OPTION_LENGTH) {
      options.push(option);
    }
  }

  return options.slice(0, MAX_DISAMBIGUATION_OPTIONS);
}
