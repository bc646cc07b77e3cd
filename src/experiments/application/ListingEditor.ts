// src/experiments/application/ListingEditor.ts

/**
 * ListingEditor
 * -------------
 * Runs single content-API calls inside their own edit:
 * - reads: begin edit -> call (the edit is left to expire)
 * - writes: begin edit -> call -> commit
 *
 * Any failure along the way surfaces as ExternalApiError carrying the
 * package/language/image-type context of the call.
 */

import path from 'path';

import type {
  ImageType,
  ListingFields,
  ListingImage,
  ListingTextFields,
} from '../domain/ExperimentPlan';
import type { CommitOptions, EditRef, IListingContentApi } from '../domain/ListingContentApi';
import { ExternalApiError } from '../domain/ExperimentErrors';
import type { ExternalApiContext } from '../domain/ExperimentErrors';

const MIME_TYPES_BY_EXTENSION: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
};

export function guessImageMimeType(filePath: string): string {
  return MIME_TYPES_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

export class ListingEditor {
  public constructor(private readonly api: IListingContentApi) {}

  public async listListings(packageName: string): Promise<ListingFields[]> {
    return this.read({ operation: 'listListings', packageName }, (edit) =>
      this.api.listListings(edit),
    );
  }

  public async getListing(packageName: string, language: string): Promise<ListingFields> {
    return this.read({ operation: 'getListing', packageName, language }, (edit) =>
      this.api.getListing(edit, language),
    );
  }

  public async listImages(
    packageName: string,
    language: string,
    imageType: ImageType,
  ): Promise<ListingImage[]> {
    return this.read({ operation: 'listImages', packageName, language, imageType }, (edit) =>
      this.api.listImages(edit, language, imageType),
    );
  }

  public async patchListing(
    packageName: string,
    language: string,
    fields: ListingTextFields,
    options: CommitOptions,
  ): Promise<ListingFields> {
    return this.write({ operation: 'patchListing', packageName, language }, options, (edit) =>
      this.api.patchListing(edit, language, fields),
    );
  }

  public async deleteAllImages(
    packageName: string,
    language: string,
    imageType: ImageType,
    options: CommitOptions,
  ): Promise<ListingImage[]> {
    return this.write(
      { operation: 'deleteAllImages', packageName, language, imageType },
      options,
      (edit) => this.api.deleteAllImages(edit, language, imageType),
    );
  }

  public async uploadImage(
    packageName: string,
    language: string,
    imageType: ImageType,
    filePath: string,
    options: CommitOptions,
  ): Promise<ListingImage> {
    const mimeType = guessImageMimeType(filePath);

    return this.write(
      { operation: 'uploadImage', packageName, language, imageType, filePath },
      options,
      (edit) => this.api.uploadImage(edit, language, imageType, { filePath, mimeType }),
    );
  }

  private async read<T>(context: ExternalApiContext, call: (edit: EditRef) => Promise<T>): Promise<T> {
    try {
      const edit = await this.api.beginEdit(context.packageName);
      return await call(edit);
    } catch (err) {
      throw new ExternalApiError(context, err);
    }
  }

  private async write<T>(
    context: ExternalApiContext,
    options: CommitOptions,
    call: (edit: EditRef) => Promise<T>,
  ): Promise<T> {
    try {
      const edit = await this.api.beginEdit(context.packageName);
      const result = await call(edit);
      await this.api.commitEdit(edit, options);
      return result;
    } catch (err) {
      throw new ExternalApiError(context, err);
    }
  }
}
