export {
  advanceProcessingStatus,
  isVerificationEligible,
  PROCESSING_STATUS_ORDER,
  resolveSourceDocument,
} from './resolver';
