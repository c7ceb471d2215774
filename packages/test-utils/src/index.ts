export {
  createTestHub,
  createTestIdentity,
  createCaptureReporter,
  subscribeForwarder,
  Forwarder,
} from './mock-factories.js';
