import type { PageTitle } from '../domain/index.js';

export interface SiteSettings {
  /** Wiki id written to the `database` attribute. */
  dbName: string;
  /** Written to `meta.domain`. */
  domain: string;
  canonicalServer: string;
  /** Contains `$1` where the title goes, e.g. `/wiki/$1`. */
  articlePath: string;
  userNamespace: string;
}

/** Percent-encodes a title, leaving `; @ $ ! * ( ) , / ~ :` readable. Apostrophes become `%27`. */
export function wikiUrlencode(value: string): string {
  return encodeURIComponent(value)
    .replace(/%(3B|40|24|2C|2F|3A)/gi, (escaped) => decodeURIComponent(escaped))
    .replace(/'/g, '%27');
}

function pathFor(site: SiteSettings, encodedTitle: string): string {
  return site.canonicalServer + site.articlePath.replace('$1', () => encodedTitle);
}

export function articleUrl(site: SiteSettings, title: PageTitle | string): string {
  const key = typeof title === 'string' ? title : title.prefixedDbKey;
  return pathFor(site, wikiUrlencode(key));
}

export function userPageUrl(site: SiteSettings, userName: string): string {
  return pathFor(site, wikiUrlencode(`${site.userNamespace}:${userName}`.replace(/ /g, '_')));
}
