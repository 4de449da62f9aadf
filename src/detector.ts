import type { Tensor } from 'onnxruntime-common';
import logger from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { getConfigManager, type DetectorConfig, type GridboxConfig } from './config/index.js';
import { assertAnchors } from './geometry/anchors.js';
import { assignTargetsWithReport, type AssignmentReport } from './assignment/targetAssigner.js';
import { computeBatchLoss, computeLossTerms, resolveLossWeights } from './loss/detectionLoss.js';
import {
  INFERENCE_CONFIDENCE_THRESHOLD,
  decodeWithReport,
  resolveDecodeOptions,
  type DecodeOptions,
  type DecodeReport
} from './decode/decoder.js';
import {
  BatchTensor,
  GridTensor,
  assertGridSpec,
  formatDims,
  fromOnnxTensor,
  sameGridSpec
} from './tensor/gridTensor.js';
import type { Anchor, Detection, GridSpec, GroundTruthBox, LossTerms, LossWeights } from './types.js';

const DEFAULT_DETECTOR_NAME = 'grid';

type Prediction = GridTensor | BatchTensor;

/**
 * Binds a grid layout, an anchor set, loss weights and decode settings, and
 * records every call in the metrics registry under the detector name.
 */
export class GridDetector {
  readonly name: string;
  private readonly spec: GridSpec;
  private readonly anchors: readonly Anchor[];
  private readonly weights: LossWeights;
  private readonly decodeOptions: DecodeOptions;
  private readonly inferenceThreshold: number;

  constructor(
    config: DetectorConfig,
    private readonly registry: MetricsRegistry = metrics
  ) {
    assertAnchors(config.anchors);
    this.name = config.name ?? DEFAULT_DETECTOR_NAME;
    this.anchors = config.anchors.map(anchor => ({ ...anchor }));
    this.spec = {
      gridHeight: config.gridHeight,
      gridWidth: config.gridWidth,
      numAnchors: this.anchors.length,
      numClasses: config.numClasses
    };
    assertGridSpec(this.spec);
    this.weights = resolveLossWeights(config.loss);

    const { inferenceThreshold, ...decodeOptions } = config.decode ?? {};
    resolveDecodeOptions(decodeOptions);
    this.decodeOptions = decodeOptions;
    this.inferenceThreshold = inferenceThreshold ?? INFERENCE_CONFIDENCE_THRESHOLD;
  }

  static fromConfig(config: GridboxConfig = getConfigManager().getConfig(), registry?: MetricsRegistry) {
    return new GridDetector(config.detector, registry);
  }

  gridSpec(): GridSpec {
    return { ...this.spec };
  }

  lossWeights(): LossWeights {
    return { ...this.weights };
  }

  assign(groundTruth: readonly GroundTruthBox[]): GridTensor {
    return this.assignWithReport(groundTruth).targets;
  }

  assignWithReport(groundTruth: readonly GroundTruthBox[]): AssignmentReport {
    return this.instrument('assign', () => {
      const report = assignTargetsWithReport(groundTruth, this.spec, this.anchors);
      this.registry.incrementDetectorCounter(this.name, 'assignments', report.assignments.length);
      if (report.collisions.length > 0) {
        this.registry.incrementDetectorCounter(this.name, 'collisions', report.collisions.length);
      }
      return report;
    });
  }

  loss(predictions: Prediction, targets: Prediction): LossTerms {
    return this.instrument('loss', () => {
      this.assertMatchesGrid(predictions);
      return this.recordLoss(computeLossTerms(predictions, targets, this.weights));
    });
  }

  /** Assigns targets for each image of the batch and returns the summed loss. */
  trainingLoss(
    predictions: BatchTensor,
    groundTruth: readonly (readonly GroundTruthBox[])[]
  ): LossTerms {
    return this.instrument('loss', () => {
      this.assertMatchesGrid(predictions);
      return this.recordLoss(computeBatchLoss(predictions, groundTruth, this.anchors, this.weights));
    });
  }

  decode(prediction: GridTensor, overrides: DecodeOptions = {}): Detection[] {
    return this.instrument('decode', () => {
      this.assertMatchesGrid(prediction);
      return this.recordDecode(decodeWithReport(prediction, { ...this.decodeOptions, ...overrides }))
        .detections;
    });
  }

  decodeBatch(batch: BatchTensor, overrides: DecodeOptions = {}): Detection[][] {
    return batch.images().map(image => this.decode(image, overrides));
  }

  /** Decodes model output at the inference confidence threshold. */
  infer(output: BatchTensor | Tensor, overrides: DecodeOptions = {}): Detection[][] {
    const batch = output instanceof BatchTensor ? output : fromOnnxTensor(output);
    return this.decodeBatch(batch, { confidenceThreshold: this.inferenceThreshold, ...overrides });
  }

  private recordLoss(terms: LossTerms) {
    this.registry.incrementDetectorCounter(this.name, 'loss-evaluations');
    this.registry.setDetectorGauge(this.name, 'loss.box', terms.box);
    this.registry.setDetectorGauge(this.name, 'loss.objectness', terms.objectness);
    this.registry.setDetectorGauge(this.name, 'loss.noObjectness', terms.noObjectness);
    this.registry.setDetectorGauge(this.name, 'loss.classification', terms.classification);
    this.registry.setDetectorGauge(this.name, 'loss.total', terms.total);
    return terms;
  }

  private recordDecode(report: DecodeReport) {
    this.registry.incrementDetectorCounter(this.name, 'decodes');
    this.registry.incrementDetectorCounter(this.name, 'candidates', report.candidates);
    this.registry.incrementDetectorCounter(this.name, 'suppressed', report.suppressed);
    this.registry.incrementDetectorCounter(this.name, 'detections', report.detections.length);
    this.registry.observeCount(`detector.${this.name}.detections`, report.detections.length);
    if (report.detections.length === 0) {
      logger.debug(
        { detector: this.name, candidates: report.candidates },
        'No detections above confidence threshold'
      );
    }
    return report;
  }

  private assertMatchesGrid(prediction: Prediction) {
    if (!sameGridSpec(prediction.spec, this.spec)) {
      throw new Error(
        `Prediction shape ${formatDims(prediction.dims)} does not match detector grid ${this.describeGrid()}`
      );
    }
  }

  private describeGrid() {
    const { numAnchors, gridHeight, gridWidth, numClasses } = this.spec;
    return `${numAnchors}x${gridHeight}x${gridWidth} with ${numClasses} classes`;
  }

  private instrument<T>(operation: string, fn: () => T): T {
    try {
      return this.registry.time(`detector.${this.name}.${operation}`, fn);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.registry.recordDetectorError(this.name, message);
      logger.error({ err: error, detector: this.name, operation }, 'Grid detector operation failed');
      throw error;
    }
  }
}

export default GridDetector;
