/**
 * ReadinessGuard
 *
 * Advisory pre-flight check: does the target locale already have a live listing?
 * Read-only. Callers decide whether to create a plan when it does not.
 */

import type { ListingEditor } from './ListingEditor';

export type ReadinessReport = {
  localePresent: boolean;
  presentLocales: string[];
};

export class ReadinessGuard {
  public constructor(private readonly listingEditor: Pick<ListingEditor, 'listListings'>) {}

  public async check(packageName: string, language: string): Promise<ReadinessReport> {
    const listings = await this.listingEditor.listListings(packageName);
    const locales = new Set(listings.map((listing) => listing.language));

    return {
      localePresent: locales.has(language),
      presentLocales: [...locales].sort(),
    };
  }
}
