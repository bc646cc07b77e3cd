// tests/application/listingEditor.application.test.ts

import { ExternalApiError } from '../../src/experiments/domain/ExperimentErrors';
import { guessImageMimeType, ListingEditor } from '../../src/experiments/application/ListingEditor';

import { FakeListingContentApi } from '../support/FakeListingContentApi';

const PKG = 'com.example.app';

describe('ListingEditor', () => {
  it('reads inside an edit without committing it', async () => {
    const api = new FakeListingContentApi([{ language: 'en-US', title: 'Example' }]);
    const editor = new ListingEditor(api);

    const listing = await editor.getListing(PKG, 'en-US');

    expect(listing).toEqual({ language: 'en-US', title: 'Example' });
    expect(api.calls).toEqual([
      { op: 'beginEdit', packageName: PKG },
      { op: 'getListing', editId: 'edit-1', language: 'en-US' },
    ]);
  });

  it('commits the edit after a write', async () => {
    const api = new FakeListingContentApi([{ language: 'de-DE' }]);
    const editor = new ListingEditor(api);

    const updated = await editor.patchListing(
      PKG,
      'de-DE',
      { shortDescription: 'Kurz' },
      { changesNotSentForReview: false },
    );

    expect(updated).toEqual({ language: 'de-DE', shortDescription: 'Kurz' });
    expect(api.calls).toEqual([
      { op: 'beginEdit', packageName: PKG },
      { op: 'patchListing', editId: 'edit-1', language: 'de-DE', fields: { shortDescription: 'Kurz' } },
      { op: 'commitEdit', editId: 'edit-1', changesNotSentForReview: false },
    ]);
  });

  it('opens a fresh edit for every call', async () => {
    const api = new FakeListingContentApi([{ language: 'en-US' }]);
    const editor = new ListingEditor(api);

    await editor.listImages(PKG, 'en-US', 'icon');
    await editor.deleteAllImages(PKG, 'en-US', 'icon', { changesNotSentForReview: true });

    expect(api.calls.map((call) => ('editId' in call ? call.editId : call.op))).toEqual([
      'beginEdit',
      'edit-1',
      'beginEdit',
      'edit-2',
      'edit-2',
    ]);
  });

  it('uploads with a mime type guessed from the file extension', async () => {
    const api = new FakeListingContentApi();
    const editor = new ListingEditor(api);

    const image = await editor.uploadImage(PKG, 'en-US', 'featureGraphic', '/art/Feature.JPG', {
      changesNotSentForReview: false,
    });

    expect(image).toEqual({ id: 'img-1' });
    expect(api.calls[1]).toEqual({
      op: 'uploadImage',
      editId: 'edit-1',
      language: 'en-US',
      imageType: 'featureGraphic',
      upload: { filePath: '/art/Feature.JPG', mimeType: 'image/jpeg' },
    });
  });

  it('wraps API failures with the call context', async () => {
    const api = new FakeListingContentApi([{ language: 'en-US' }]);
    api.failOnce('patchListing', new Error('boom'));
    const editor = new ListingEditor(api);

    const error = await editor
      .patchListing(PKG, 'en-US', { title: 'X' }, { changesNotSentForReview: false })
      .catch((err: unknown) => err);

    if (!(error instanceof ExternalApiError)) throw error;
    expect(error.message).toBe('Failed to patch listing for com.example.app [en-US]: boom');
    expect(error.context).toEqual({ operation: 'patchListing', packageName: PKG, language: 'en-US' });
    expect(api.opsCalled()).toEqual(['beginEdit', 'patchListing']);
  });

  it('reports a failed commit as an API error', async () => {
    const api = new FakeListingContentApi();
    api.failOnce('commitEdit', new Error('edit expired'));
    const editor = new ListingEditor(api);

    await expect(
      editor.uploadImage(PKG, 'en-US', 'icon', '/art/icon.png', { changesNotSentForReview: false }),
    ).rejects.toThrow(
      'Failed to upload image for com.example.app [en-US/icon] from /art/icon.png: edit expired',
    );
  });

  it('wraps a failure to open the edit', async () => {
    const api = new FakeListingContentApi();
    api.failOnce('beginEdit', new Error('unauthorized'));
    const editor = new ListingEditor(api);

    await expect(editor.listListings(PKG)).rejects.toThrow(
      'Failed to list listings for com.example.app: unauthorized',
    );
  });
});

describe('guessImageMimeType', () => {
  it('maps known image extensions', () => {
    expect(guessImageMimeType('a.png')).toBe('image/png');
    expect(guessImageMimeType('a.jpeg')).toBe('image/jpeg');
    expect(guessImageMimeType('a.webp')).toBe('image/webp');
  });

  it('falls back to a generic binary type', () => {
    expect(guessImageMimeType('a.gif')).toBe('application/octet-stream');
    expect(guessImageMimeType('noext')).toBe('application/octet-stream');
  });
});
