export {
  linkEventEntities,
  linkEventRawEvent,
  linkRawEventEntities,
  linkViewpointEvents,
} from './associationWriter';
