// src/experiments/infrastructure/AndroidPublisherContentApi.ts

/**
 * AndroidPublisherContentApi
 *
 * Infrastructure implementation of IListingContentApi on the Android Publisher v3
 * API (`googleapis`).
 *
 * Standards applied:
 * - Boundary mapping: API payloads <-> domain listing/image shapes are localized here.
 * - googleapis-decoupling: narrow client shape (avoids tight coupling to generated types),
 *   so tests can pass a fake client.
 */

import { createReadStream } from 'fs';
import { google } from 'googleapis';

import type {
  ImageType,
  ListingFields,
  ListingImage,
  ListingTextFields,
} from '../domain/ExperimentPlan';
import type {
  CommitOptions,
  EditRef,
  IListingContentApi,
  ImageUpload,
} from '../domain/ListingContentApi';

export const ANDROID_PUBLISHER_SCOPE = 'https://www.googleapis.com/auth/androidpublisher';

type ApiResponse = { data: unknown };
type ApiMethod = (params: Record<string, unknown>) => Promise<ApiResponse>;

/**
 * Narrow surface of the generated `androidpublisher_v3.Androidpublisher` client used here.
 */
export type AndroidPublisherClient = {
  edits: {
    insert: ApiMethod;
    commit: ApiMethod;
    listings: {
      list: ApiMethod;
      get: ApiMethod;
      patch: ApiMethod;
    };
    images: {
      list: ApiMethod;
      deleteall: ApiMethod;
      upload: ApiMethod;
    };
  };
};

/**
 * Build an authorized client from a service-account key file.
 */
export function createAndroidPublisherClient(keyFile: string): AndroidPublisherClient {
  const auth = new google.auth.GoogleAuth({ keyFile, scopes: [ANDROID_PUBLISHER_SCOPE] });
  return google.androidpublisher({ version: 'v3', auth }) as unknown as AndroidPublisherClient;
}

export class AndroidPublisherContentApi implements IListingContentApi {
  public constructor(private readonly client: AndroidPublisherClient) {}

  public async beginEdit(packageName: string): Promise<EditRef> {
    const { data } = await this.client.edits.insert({ packageName, requestBody: {} });
    const editId = isRecord(data) ? readString(data, 'id') : undefined;

    if (!editId) {
      throw new Error(`Edit insert for ${packageName} returned no edit id`);
    }

    return { packageName, editId };
  }

  public async commitEdit(edit: EditRef, options: CommitOptions): Promise<void> {
    await this.client.edits.commit({
      packageName: edit.packageName,
      editId: edit.editId,
      changesNotSentForReview: options.changesNotSentForReview,
    });
  }

  public async listListings(edit: EditRef): Promise<ListingFields[]> {
    const { data } = await this.client.edits.listings.list({ ...edit });

    return readArray(data, 'listings')
      .map((item) => toListingFields(item))
      .filter((listing): listing is ListingFields => listing !== null);
  }

  public async getListing(edit: EditRef, language: string): Promise<ListingFields> {
    const { data } = await this.client.edits.listings.get({ ...edit, language });
    return toListingFields(data, language) ?? { language };
  }

  public async patchListing(
    edit: EditRef,
    language: string,
    fields: ListingTextFields,
  ): Promise<ListingFields> {
    const { data } = await this.client.edits.listings.patch({
      ...edit,
      language,
      requestBody: fields,
    });
    return toListingFields(data, language) ?? { language };
  }

  public async listImages(
    edit: EditRef,
    language: string,
    imageType: ImageType,
  ): Promise<ListingImage[]> {
    const { data } = await this.client.edits.images.list({ ...edit, language, imageType });
    return toImages(readArray(data, 'images'));
  }

  public async deleteAllImages(
    edit: EditRef,
    language: string,
    imageType: ImageType,
  ): Promise<ListingImage[]> {
    const { data } = await this.client.edits.images.deleteall({ ...edit, language, imageType });
    return toImages(readArray(data, 'deleted'));
  }

  public async uploadImage(
    edit: EditRef,
    language: string,
    imageType: ImageType,
    upload: ImageUpload,
  ): Promise<ListingImage> {
    // the client may reject before reading the body; close it either way
    const body = createReadStream(upload.filePath);

    let data: unknown;
    try {
      ({ data } = await this.client.edits.images.upload({
        ...edit,
        language,
        imageType,
        media: { mimeType: upload.mimeType, body },
      }));
    } finally {
      body.destroy();
    }

    const image = isRecord(data) ? toImage(data.image) : null;
    if (!image) {
      throw new Error(`Upload of ${upload.filePath} returned no image`);
    }

    return image;
  }
}

/* ------------------------- small internal helpers ------------------------- */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

function readArray(data: unknown, key: string): unknown[] {
  if (!isRecord(data)) return [];
  const value = data[key];
  return Array.isArray(value) ? value : [];
}

function toListingFields(value: unknown, fallbackLanguage?: string): ListingFields | null {
  if (!isRecord(value)) return null;

  const language = readString(value, 'language') ?? fallbackLanguage;
  if (!language) return null;

  const title = readString(value, 'title');
  const shortDescription = readString(value, 'shortDescription');
  const fullDescription = readString(value, 'fullDescription');
  const video = readString(value, 'video');

  return {
    language,
    ...(title !== undefined ? { title } : {}),
    ...(shortDescription !== undefined ? { shortDescription } : {}),
    ...(fullDescription !== undefined ? { fullDescription } : {}),
    ...(video !== undefined ? { video } : {}),
  };
}

function toImage(value: unknown): ListingImage | null {
  if (!isRecord(value)) return null;

  const id = readString(value, 'id');
  if (!id) return null;

  const url = readString(value, 'url');
  const sha256 = readString(value, 'sha256');

  return {
    id,
    ...(url !== undefined ? { url } : {}),
    ...(sha256 !== undefined ? { sha256 } : {}),
  };
}

function toImages(values: unknown[]): ListingImage[] {
  return values
    .map((value) => toImage(value))
    .filter((image): image is ListingImage => image !== null);
}
