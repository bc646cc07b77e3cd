// tests/application/readinessGuard.application.test.ts

import { ListingEditor } from '../../src/experiments/application/ListingEditor';
import { ReadinessGuard } from '../../src/experiments/application/ReadinessGuard';

import { FakeListingContentApi } from '../support/FakeListingContentApi';

function guardWith(languages: string[]) {
  const api = new FakeListingContentApi(languages.map((language) => ({ language })));
  return { api, guard: new ReadinessGuard(new ListingEditor(api)) };
}

describe('ReadinessGuard', () => {
  it('reports a present locale with every live locale sorted', async () => {
    const { guard } = guardWith(['fr-FR', 'en-US', 'de-DE']);

    await expect(guard.check('com.example.app', 'en-US')).resolves.toEqual({
      localePresent: true,
      presentLocales: ['de-DE', 'en-US', 'fr-FR'],
    });
  });

  it('matches locales exactly', async () => {
    const { guard } = guardWith(['en-US']);

    const report = await guard.check('com.example.app', 'en-us');

    expect(report.localePresent).toBe(false);
    expect(report.presentLocales).toEqual(['en-US']);
  });

  it('handles an app with no listings', async () => {
    const { guard } = guardWith([]);

    await expect(guard.check('com.example.app', 'en-US')).resolves.toEqual({
      localePresent: false,
      presentLocales: [],
    });
  });

  it('never commits an edit', async () => {
    const { api, guard } = guardWith(['en-US']);

    await guard.check('com.example.app', 'en-US');

    expect(api.opsCalled()).toEqual(['beginEdit', 'listListings']);
  });
});
