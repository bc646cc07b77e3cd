/**
 * ExperimentPlan
 *
 * A locally persisted store-listing experiment for one package + locale.
 * It carries:
 *  - Identity and target listing (package, language)
 *  - Free-text metadata (name, hypothesis, notes)
 *  - Candidate content variants
 *  - Lifecycle status
 *  - The latest significance evaluation
 *  - Progress of the most recent winner promotion
 */

export type PlanStatus = 'draft' | 'running' | 'stopped' | 'applied' | 'archived';

export const PLAN_STATUSES: readonly PlanStatus[] = [
  'draft',
  'running',
  'stopped',
  'applied',
  'archived',
];

export type ExperimentType = 'text' | 'graphics' | 'mixed';

export const EXPERIMENT_TYPES: readonly ExperimentType[] = ['text', 'graphics', 'mixed'];

/**
 * Image slots of a localized store listing.
 */
export type ImageType =
  | 'phoneScreenshots'
  | 'sevenInchScreenshots'
  | 'tenInchScreenshots'
  | 'tvScreenshots'
  | 'wearScreenshots'
  | 'icon'
  | 'featureGraphic'
  | 'tvBanner';

export const IMAGE_TYPES: readonly ImageType[] = [
  'phoneScreenshots',
  'sevenInchScreenshots',
  'tenInchScreenshots',
  'tvScreenshots',
  'wearScreenshots',
  'icon',
  'featureGraphic',
  'tvBanner',
];

/**
 * Reference to a local image file that should replace listing images of one type.
 * The file is owned by the caller; only the path is stored.
 */
export interface VariantAsset {
  imageType: ImageType;
  filePath: string;
}

/**
 * Text/video fields of a localized listing. Absent fields are left untouched.
 */
export interface ListingTextFields {
  title?: string;
  shortDescription?: string;
  fullDescription?: string;
  video?: string;
}

export interface Variant extends ListingTextFields {
  variantId: string;
  label: string;
  assets?: VariantAsset[];
}

/* ------------------------------ significance ------------------------------ */

export interface VariantCounts {
  visitors: number;
  conversions: number;
}

export type Recommendation = 'promote_winner' | 'collect_more_data' | 'continue';

export interface BayesResult {
  winner: string;
  winnerProbability: number;
  probabilities: Record<string, number>;
  meanRates: Record<string, number>;

  /**
   * Lift of each variant's posterior mean over the first variant.
   * null when the baseline mean is zero.
   */
  relativeLiftVsBaseline: Record<string, number | null>;
}

export interface SignificanceSnapshot {
  metrics: Record<string, VariantCounts>;
  bayes: BayesResult;
  recommendation: Recommendation;
  evaluatedAt: string;
}

/* -------------------------------- promotion ------------------------------- */

/**
 * Listing text as returned by the content API.
 */
export interface ListingFields extends ListingTextFields {
  language: string;
}

export interface ListingImage {
  id: string;
  url?: string;
  sha256?: string;
}

export interface UploadedImage {
  imageType: ImageType;
  filePath: string;
  image: ListingImage;
}

/**
 * Live listing state captured before the first mutating step of a promotion.
 */
export interface ListingBaseline {
  capturedAt: string;
  listing: ListingFields;
  images: Partial<Record<ImageType, ListingImage[]>>;
}

export interface PromotionImageGroup {
  imageType: ImageType;
  files: string[];
  clearedAt?: string;

  /**
   * uploads[i] is the result for files[i].
   */
  uploads: UploadedImage[];
}

/**
 * An unfinished promotion replaced by a promotion of another variant.
 */
export interface AbandonedPromotion {
  variantId: string;
  completedSteps: string[];
  abandonedAt: string;
}

export interface PromotionProgress {
  variantId: string;
  changesNotSentForReview: boolean;
  startedAt: string;

  /**
   * Live state before the first promotion of this plan touched it. Carried over
   * when an unfinished promotion is replaced.
   */
  baseline?: ListingBaseline;
  abandoned?: AbandonedPromotion[];
  textPatch?: {
    completedAt: string;
    result: ListingFields | null;
  };
  imageGroups: PromotionImageGroup[];
  completedAt?: string;
}

/* ---------------------------------- plan ---------------------------------- */

export interface ExperimentPlan {
  planId: string;
  packageName: string;
  language: string;

  name: string;
  hypothesis?: string;
  notes?: string;

  metric: string;
  trafficProportion: number;
  type: ExperimentType;

  variants: Variant[];
  status: PlanStatus;

  createdAt: string;
  updatedAt: string;

  lastResults?: SignificanceSnapshot;
  promotion?: PromotionProgress;
}

export const MIN_TRAFFIC_PROPORTION = 0.1;
export const MAX_TRAFFIC_PROPORTION = 1.0;

/**
 * Clamp a traffic share into [0.1, 1.0]. A missing value means full traffic.
 */
export function clampTrafficProportion(value: number | undefined): number {
  if (value === undefined || value === 0 || Number.isNaN(value)) return MAX_TRAFFIC_PROPORTION;
  return Math.max(MIN_TRAFFIC_PROPORTION, Math.min(MAX_TRAFFIC_PROPORTION, value));
}

export function findVariant(plan: ExperimentPlan, variantId: string): Variant | undefined {
  return plan.variants.find((v) => v.variantId === variantId);
}

/**
 * Present text fields of a variant, in listing shape.
 */
export function pickListingText(variant: ListingTextFields): ListingTextFields {
  return {
    ...(variant.title !== undefined ? { title: variant.title } : {}),
    ...(variant.shortDescription !== undefined
      ? { shortDescription: variant.shortDescription }
      : {}),
    ...(variant.fullDescription !== undefined
      ? { fullDescription: variant.fullDescription }
      : {}),
    ...(variant.video !== undefined ? { video: variant.video } : {}),
  };
}

export function isPlanStatus(value: unknown): value is PlanStatus {
  return typeof value === 'string' && PLAN_STATUSES.some((s) => s === value);
}

export function isImageType(value: unknown): value is ImageType {
  return typeof value === 'string' && IMAGE_TYPES.some((t) => t === value);
}

export function isExperimentType(value: unknown): value is ExperimentType {
  return typeof value === 'string' && EXPERIMENT_TYPES.some((t) => t === value);
}
