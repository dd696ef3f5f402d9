import { homedir } from "node:os";
import { join } from "node:path";
import type { Dataset } from "@ocrsets/core";
import type { ProgressFn } from "@ocrsets/cache";
import type { CocoTextLabels } from "./labels.js";

export const COCO_TEXT_SPLITS = ["train", "val", "trainval"] as const;
export type CocoTextSplit = (typeof COCO_TEXT_SPLITS)[number];

export const BORN_DIGITAL_SPLITS = ["train", "test", "traintest"] as const;
export type BornDigitalSplit = (typeof BORN_DIGITAL_SPLITS)[number];

/** A remote file and the SHA-256 it must hash to. */
export interface RemoteFile {
  readonly url: string;
  readonly sha256: string;
}

export const COCO_TEXT_LABELS: RemoteFile = {
  url: "https://github.com/bgshih/cocotext/releases/download/dl/cocotext.v2.zip",
  sha256: "1444893ce7dbcd8419b2ec9be6beb0dba9cf8a43bf36cab4293d5ba6cecb7fb1",
};
export const COCO_TEXT_LABELS_MEMBER = "cocotext.v2.json";
export const COCO_IMAGES_BASE_URL = "http://images.cocodataset.org/train2014";

export const BORN_DIGITAL_TRAIN: RemoteFile = {
  url: "https://storage.googleapis.com/keras-ocr/borndigital/Challenge1_Training_Task3_Images_GT.zip",
  sha256: "8ede0639f5a8031d584afd98cee893d1c5275d7f17863afc2cba24b13c932b07",
};
export const BORN_DIGITAL_TEST_IMAGES: RemoteFile = {
  url: "https://storage.googleapis.com/keras-ocr/borndigital/Challenge1_Test_Task3_Images.zip",
  sha256: "8f781b0140fd0bac3750530f0924bce5db3341fd314a2fcbe9e0b6ca409a77f0",
};
export const BORN_DIGITAL_TEST_GT: RemoteFile = {
  url: "https://storage.googleapis.com/keras-ocr/borndigital/Challenge1_Test_Task3_GT.txt",
  sha256: "fce7f1228b7c4c26a59f13f562085148acf063d6690ce51afc395e0a1aabf8be",
};

/** `$OCRSETS_CACHE_DIR`, else `~/.ocrsets`. */
export function defaultCacheDir(): string {
  return process.env.OCRSETS_CACHE_DIR || join(homedir(), ".ocrsets");
}

export interface BornDigitalFiles {
  readonly train: RemoteFile;
  readonly testImages: RemoteFile;
  readonly testGroundTruth: RemoteFile;
}

export const BORN_DIGITAL_FILES: BornDigitalFiles = {
  train: BORN_DIGITAL_TRAIN,
  testImages: BORN_DIGITAL_TEST_IMAGES,
  testGroundTruth: BORN_DIGITAL_TEST_GT,
};

export interface CocoTextFiles {
  readonly labels: RemoteFile;
  /** Directory URL the image file names are appended to. */
  readonly imagesBaseUrl: string;
}

export const COCO_TEXT_FILES: CocoTextFiles = {
  labels: COCO_TEXT_LABELS,
  imagesBaseUrl: COCO_IMAGES_BASE_URL,
};

export interface BornDigitalOptions {
  readonly split?: string;
  /** Mirror overrides for the published archives. */
  readonly files?: Partial<BornDigitalFiles>;
  /** Cache root. Default: `defaultCacheDir()`. */
  readonly cacheDir?: string;
  readonly timeoutMs?: number;
}

export interface CocoTextOptions {
  readonly split?: string;
  /** Mirror overrides for the label archive and image host. */
  readonly files?: Partial<CocoTextFiles>;
  readonly cacheDir?: string;
  /** Cap on distinct images (not annotations). */
  readonly limit?: number;
  readonly legibleOnly?: boolean;
  readonly englishOnly?: boolean;
  readonly returnRawLabels?: boolean;
  /** Parallel image downloads. */
  readonly concurrency?: number;
  readonly onProgress?: ProgressFn;
  readonly timeoutMs?: number;
}

export interface CocoTextRaw {
  /** The index pruned to the selected images and their annotations. */
  readonly labels: CocoTextLabels;
  readonly imagesDir: string;
}

export interface CocoTextWithRaw {
  readonly dataset: Dataset;
  readonly raw: CocoTextRaw;
}
