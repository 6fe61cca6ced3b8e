export interface AppTitle {
  readonly shortDesc: string;
  readonly longDesc: string;
  readonly publisher: string;
}

export function appTitle(shortDesc: string, longDesc: string, publisher: string): AppTitle {
  return Object.freeze({ shortDesc, longDesc, publisher });
}

export const EMPTY_APP_TITLE = appTitle('', '', '');
export const UNKNOWN_APP_TITLE = appTitle('unknown', 'unknown', 'unknown');

export function isEmptyAppTitle(title: AppTitle): boolean {
  return title.shortDesc === '' && title.longDesc === '' && title.publisher === '';
}
