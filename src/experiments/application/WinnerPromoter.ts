// src/experiments/application/WinnerPromoter.ts

/**
 * WinnerPromoter
 * --------------
 * Copies a variant's content into the live listing and marks the plan applied.
 *
 * Promotion is a sequence of remote steps that cannot be undone from here:
 *   1) text patch (present fields only)
 *   2) per image type, in first-appearance order: delete-all, then sequential uploads
 *
 * Each completed step is written to `plan.promotion` before the next one starts.
 * Calling applyWinner again for the same variant after a failure skips what is
 * already done. A snapshot of the live listing taken before the first step is
 * kept on the progress record for manual restores.
 */

import { access } from 'fs/promises';
import { constants } from 'fs';

import type {
  ExperimentPlan,
  ImageType,
  ListingBaseline,
  ListingFields,
  ListingImage,
  PlanStatus,
  PromotionImageGroup,
  PromotionProgress,
  UploadedImage,
  Variant,
} from '../domain/ExperimentPlan';
import { findVariant, pickListingText } from '../domain/ExperimentPlan';
import type { IPlanStore } from '../domain/PlanStore';
import type { CommitOptions } from '../domain/ListingContentApi';
import { NotFoundError, PartialFailureError } from '../domain/ExperimentErrors';
import { nextStatus } from '../domain/PlanLifecycle';
import { logger } from '../../shared/logging/Logger';

import type { ListingEditor } from './ListingEditor';

export type WinnerPromoterDeps = {
  planStore: IPlanStore;
  listingEditor: Pick<
    ListingEditor,
    'getListing' | 'listImages' | 'patchListing' | 'deleteAllImages' | 'uploadImage'
  >;
  now?: () => Date;

  /**
   * Local asset check run before any remote call. Defaults to a readable-file check.
   */
  assetExists?: (filePath: string) => Promise<boolean>;
};

export type ApplyWinnerOptions = {
  changesNotSentForReview?: boolean;
};

export type ApplyWinnerResult = {
  planId: string;
  appliedVariant: string;
  textPatch: ListingFields | null;
  assetUploads: UploadedImage[];
  status: PlanStatus;

  /**
   * Steps completed by an earlier attempt and not repeated.
   */
  skippedSteps: string[];
};

export class WinnerPromoter {
  private readonly now: () => Date;
  private readonly assetExists: (filePath: string) => Promise<boolean>;

  public constructor(private readonly deps: WinnerPromoterDeps) {
    this.now = deps.now ?? (() => new Date());
    this.assetExists = deps.assetExists ?? isReadableFile;
  }

  public async applyWinner(
    planId: string,
    variantId: string,
    options: ApplyWinnerOptions = {},
  ): Promise<ApplyWinnerResult> {
    const plan = await this.deps.planStore.get(planId);

    const variant = findVariant(plan, variantId);
    if (!variant) {
      throw new NotFoundError('variant', variantId, `Unknown variantId ${variantId} in plan ${planId}`);
    }

    const targetStatus = nextStatus(plan, 'applyWinner');
    await this.assertAssetsExist(variant);

    const commit: CommitOptions = {
      changesNotSentForReview: options.changesNotSentForReview ?? false,
    };

    const previous = plan.promotion;
    let progress: PromotionProgress;
    let skippedSteps: string[] = [];

    if (previous && previous.completedAt === undefined && previous.variantId === variantId) {
      progress = previous;
      skippedSteps = completedSteps(progress);
      logger.info({ planId, variantId, skippedSteps }, 'Resuming promotion');
    } else {
      progress = this.startProgress(variant, previous);
    }

    progress.changesNotSentForReview = commit.changesNotSentForReview;
    plan.promotion = progress;

    let currentStep = 'baseline';
    try {
      const baseline = progress.baseline;
      if (!baseline || progress.imageGroups.some((g) => baseline.images[g.imageType] === undefined)) {
        progress.baseline = await this.captureBaseline(plan, progress.imageGroups, baseline);
        await this.persist(plan);
      }

      if (!progress.textPatch) {
        currentStep = 'text_patch';
        const fields = pickListingText(variant);
        const result =
          Object.keys(fields).length > 0
            ? await this.deps.listingEditor.patchListing(
                plan.packageName,
                plan.language,
                fields,
                commit,
              )
            : null;

        progress.textPatch = { completedAt: this.now().toISOString(), result };
        await this.persist(plan);
      }

      for (const group of progress.imageGroups) {
        if (!group.clearedAt) {
          currentStep = `clear:${group.imageType}`;
          await this.deps.listingEditor.deleteAllImages(
            plan.packageName,
            plan.language,
            group.imageType,
            commit,
          );
          group.clearedAt = this.now().toISOString();
          await this.persist(plan);
        }

        for (let i = group.uploads.length; i < group.files.length; i++) {
          const filePath = group.files[i];
          currentStep = `upload:${group.imageType}:${filePath}`;

          const image = await this.deps.listingEditor.uploadImage(
            plan.packageName,
            plan.language,
            group.imageType,
            filePath,
            commit,
          );
          group.uploads.push({ imageType: group.imageType, filePath, image });
          await this.persist(plan);
        }
      }
    } catch (err) {
      const done = completedSteps(progress);
      if (done.length === 0) throw err;

      logger.warn(
        { planId, variantId, completedSteps: done, failedStep: currentStep, err },
        'Promotion partially applied',
      );
      throw new PartialFailureError(planId, done, currentStep, err);
    }

    progress.completedAt = this.now().toISOString();
    plan.status = targetStatus;
    await this.persist(plan);

    logger.info({ planId, variantId }, 'Winner applied to live listing');

    return {
      planId: plan.planId,
      appliedVariant: variant.variantId,
      textPatch: progress.textPatch?.result ?? null,
      assetUploads: progress.imageGroups.flatMap((group) => group.uploads),
      status: plan.status,
      skippedSteps,
    };
  }

  /**
   * A fresh progress record. When it replaces an unfinished promotion, the
   * earlier baseline is kept (the live listing may already hold part of the
   * other variant) and the replaced attempt is recorded.
   */
  private startProgress(variant: Variant, previous?: PromotionProgress): PromotionProgress {
    const now = this.now().toISOString();
    const progress: PromotionProgress = {
      variantId: variant.variantId,
      changesNotSentForReview: false,
      startedAt: now,
      imageGroups: groupAssetsByType(variant),
    };

    if (!previous || previous.completedAt !== undefined) {
      return progress;
    }

    const abandoned = {
      variantId: previous.variantId,
      completedSteps: completedSteps(previous),
      abandonedAt: now,
    };
    logger.warn(
      { variantId: variant.variantId, abandoned },
      'Replacing an unfinished promotion of another variant',
    );

    return {
      ...progress,
      ...(previous.baseline ? { baseline: previous.baseline } : {}),
      abandoned: [...(previous.abandoned ?? []), abandoned],
    };
  }

  /**
   * Snapshot the listing and the image types about to be replaced. An existing
   * baseline keeps its listing and images; only image types it lacks are read.
   */
  private async captureBaseline(
    plan: ExperimentPlan,
    groups: PromotionImageGroup[],
    existing?: ListingBaseline,
  ): Promise<ListingBaseline> {
    const listing =
      existing?.listing ??
      (await this.deps.listingEditor.getListing(plan.packageName, plan.language));

    const images: Partial<Record<ImageType, ListingImage[]>> = { ...existing?.images };
    for (const group of groups) {
      if (images[group.imageType] !== undefined) continue;
      images[group.imageType] = await this.deps.listingEditor.listImages(
        plan.packageName,
        plan.language,
        group.imageType,
      );
    }

    return { capturedAt: existing?.capturedAt ?? this.now().toISOString(), listing, images };
  }

  private async assertAssetsExist(variant: Variant): Promise<void> {
    const missing: string[] = [];
    for (const asset of variant.assets ?? []) {
      if (!(await this.assetExists(asset.filePath))) {
        missing.push(asset.filePath);
      }
    }

    if (missing.length > 0) {
      throw new NotFoundError(
        'asset_file',
        missing.join(', '),
        `Asset file(s) not found: ${missing.join(', ')}`,
      );
    }
  }

  private async persist(plan: ExperimentPlan): Promise<void> {
    plan.updatedAt = this.now().toISOString();
    await this.deps.planStore.save(plan);
  }
}

/**
 * Group (imageType, filePath) pairs by type, keeping first-appearance order.
 */
export function groupAssetsByType(variant: Variant): PromotionImageGroup[] {
  const groups: PromotionImageGroup[] = [];

  for (const asset of variant.assets ?? []) {
    let group = groups.find((g) => g.imageType === asset.imageType);
    if (!group) {
      group = { imageType: asset.imageType, files: [], uploads: [] };
      groups.push(group);
    }
    group.files.push(asset.filePath);
  }

  return groups;
}

/**
 * Remote mutations already committed for this promotion, in execution order.
 */
export function completedSteps(progress: PromotionProgress): string[] {
  const steps: string[] = [];
  // a variant without text fields records a null patch that never reached the API
  if (progress.textPatch && progress.textPatch.result !== null) steps.push('text_patch');

  for (const group of progress.imageGroups) {
    if (group.clearedAt) steps.push(`clear:${group.imageType}`);
    for (const upload of group.uploads) {
      steps.push(`upload:${group.imageType}:${upload.filePath}`);
    }
  }

  return steps;
}

async function isReadableFile(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}
