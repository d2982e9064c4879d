export * from './CaptureNode.js';
export * from './CaptureSession.js';
export * from './TickLoop.js';
