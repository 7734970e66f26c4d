import { Detection, DetectionConfig } from '../../types';

export class DetectionFilter {
  private readonly targetClasses: Set<string>;
  private readonly minConfidence: number;
  private readonly minBboxArea: number;
  private readonly maxBboxArea: number;

  constructor(params: Partial<DetectionConfig> = {}) {
    this.targetClasses = new Set(params.targetClasses ?? ['bird']);
    this.minConfidence = params.minConfidence ?? 0.3;
    this.minBboxArea = params.minBboxArea ?? 0;
    this.maxBboxArea = params.maxBboxArea ?? 1;
  }

  /**
   * Keep target-class detections above the confidence threshold whose
   * normalized box area lies within [minBboxArea, maxBboxArea]. Order is kept.
   */
  apply(detections: Detection[]): Detection[] {
    return detections.filter(det => {
      if (!this.targetClasses.has(det.label) || det.confidence < this.minConfidence) {
        return false;
      }
      const area = det.width * det.height;
      return area >= this.minBboxArea && area <= this.maxBboxArea;
    });
  }
}
