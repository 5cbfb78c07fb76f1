export {
  processDocumentEvents,
  type DocumentEventsDeps,
  type DocumentEventsInput,
  type DocumentEventsResult,
} from './documentEvents';
