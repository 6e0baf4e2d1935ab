/**
 * Error types raised by the view layer.
 *
 * Errors thrown by template scripts themselves are never wrapped; they reach
 * the caller unchanged once the output capture has been released.
 */

/**
 * Base class for all errors raised by the renderer and its collaborators.
 */
export class ViewError extends Error {
  constructor (
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ViewError';
  }
}

/**
 * No template file exists at the resolved location.
 */
export class TemplateNotFoundError extends ViewError {
  constructor (
    public readonly template: string,
    public readonly path: string,
  ) {
    super(`View file does not exist: ${path}`, 'TEMPLATE_NOT_FOUND', { template, path });
    this.name = 'TemplateNotFoundError';
  }
}

/**
 * A capture frame was closed out of order or twice.
 *
 * This means the output stack is corrupted for the rest of the request.
 */
export class CaptureImbalanceError extends ViewError {
  constructor (
    message: string,
    public readonly depth: number,
  ) {
    super(message, 'CAPTURE_IMBALANCE', { depth });
    this.name = 'CaptureImbalanceError';
  }
}

/**
 * Renderer configuration failed validation.
 */
export class InvalidViewConfigError extends ViewError {
  constructor (
    public readonly issues: string[],
  ) {
    super(`Invalid view configuration: ${issues.join('; ')}`, 'INVALID_VIEW_CONFIG', { issues });
    this.name = 'InvalidViewConfigError';
  }
}
