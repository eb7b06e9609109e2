export type PipelineStageKey =
  | 'extract-email'
  | 'check-location'
  | 'plan-query'
  | 'search'
  | 'select-urls'
  | 'browse'
  | 'synthesize'
  | 'draft-email'
  | 'confirm-send';

export type PipelineStatusUpdate = {
  stage?: PipelineStageKey;
  message?: string;
  meta?: Record<string, unknown>;
};

export type StatusListener = (update: PipelineStatusUpdate) => void;
