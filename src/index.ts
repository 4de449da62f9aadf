export * from './types.js';
export {
  IOU_EPSILON,
  boxArea,
  boxFormat,
  convertBox,
  iou,
  isCornerBox,
  toCenter,
  toCorner
} from './geometry/boxes.js';
export { anchorShapeIoU, assertAnchors, selectBestAnchor, type AnchorMatch } from './geometry/anchors.js';
export {
  BOX_CHANNELS,
  BatchTensor,
  CLASS_START_INDEX,
  GridTensor,
  OBJECTNESS_INDEX,
  batchFromJson,
  fromOnnxTensor,
  specFromDims,
  tensorToJson,
  toOnnxTensor,
  type BatchDims,
  type GridDims
} from './tensor/gridTensor.js';
export {
  assignBatchTargets,
  assignTargets,
  assignTargetsWithReport,
  type AssignmentCollision,
  type AssignmentRecord,
  type AssignmentReport
} from './assignment/targetAssigner.js';
export {
  DEFAULT_LOSS_WEIGHTS,
  computeBatchLoss,
  computeLoss,
  computeLossTerms,
  resolveLossWeights
} from './loss/detectionLoss.js';
export { DEFAULT_NMS_IOU_THRESHOLD, nonMaxSuppression, type SuppressionOptions } from './decode/nms.js';
export {
  DEFAULT_CONFIDENCE_THRESHOLD,
  INFERENCE_CONFIDENCE_THRESHOLD,
  collectCandidates,
  decodeBatchDetections,
  decodeDetections,
  decodeWithReport,
  resolveDecodeOptions,
  type BoxEncoding,
  type DecodeOptions,
  type DecodeReport
} from './decode/decoder.js';
export { loadYoloLabels, parseYoloLabels } from './labels.js';
export {
  ConfigManager,
  getConfigManager,
  loadConfigFromFile,
  parseConfig,
  validateConfig,
  type DetectorConfig,
  type GridboxConfig
} from './config/index.js';
export { GridDetector } from './detector.js';
export { getLogLevel, setLogLevel } from './logger.js';
export { default as metrics, MetricsRegistry, type MetricsSnapshot } from './metrics/index.js';
