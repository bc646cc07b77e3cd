/**
 * IListingContentApi
 * ------------------
 * Narrow port onto the store publishing API.
 *
 * Every call happens inside an edit: the caller opens one with `beginEdit`,
 * issues calls against it, and commits it (mutations) or lets it expire (reads).
 */

import type {
  ImageType,
  ListingFields,
  ListingImage,
  ListingTextFields,
} from './ExperimentPlan';

export interface EditRef {
  packageName: string;
  editId: string;
}

export interface CommitOptions {
  changesNotSentForReview: boolean;
}

export interface ImageUpload {
  filePath: string;
  mimeType: string;
}

export interface IListingContentApi {
  beginEdit(packageName: string): Promise<EditRef>;
  commitEdit(edit: EditRef, options: CommitOptions): Promise<void>;

  listListings(edit: EditRef): Promise<ListingFields[]>;
  getListing(edit: EditRef, language: string): Promise<ListingFields>;
  patchListing(edit: EditRef, language: string, fields: ListingTextFields): Promise<ListingFields>;

  listImages(edit: EditRef, language: string, imageType: ImageType): Promise<ListingImage[]>;
  deleteAllImages(edit: EditRef, language: string, imageType: ImageType): Promise<ListingImage[]>;
  uploadImage(
    edit: EditRef,
    language: string,
    imageType: ImageType,
    upload: ImageUpload,
  ): Promise<ListingImage>;
}
