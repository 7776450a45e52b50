import { describe, expect, it } from 'vitest';
import { failureFeedback } from './removalFeedback';

describe('failureFeedback', () => {
  it('shows validation messages as they are', () => {
    expect(failureFeedback('VALIDATION_FAILED', 'File too large. Please upload an image smaller than 10MB.')).toEqual({
      error: 'File too large. Please upload an image smaller than 10MB.',
      sidebarError: 'Processing failed.',
    });
  });

  it('shows decode messages as they are', () => {
    expect(failureFeedback('DECODE_FAILED', 'The uploaded file is empty.')).toEqual({
      error: 'The uploaded file is empty.',
      sidebarError: 'Processing failed.',
    });
  });

  it('hides processing details behind the generic message', () => {
    expect(failureFeedback('PROCESSING_FAILED', 'onnx session exploded')).toEqual({
      error: 'An unexpected error occurred.',
      sidebarError: 'Processing failed.',
    });
  });

  it('treats other and missing codes as unexpected', () => {
    expect(failureFeedback('INVALID_INPUT', 'bad raster').error).toBe('An unexpected error occurred.');
    expect(failureFeedback('MODEL_NOT_FOUND', 'no model').error).toBe('An unexpected error occurred.');
    expect(failureFeedback(undefined, 'Bad Gateway').error).toBe('An unexpected error occurred.');
  });
});
