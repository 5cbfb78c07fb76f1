export { rawEventSignature, stageRawEvents, type StagedRawEvent } from './stager';
