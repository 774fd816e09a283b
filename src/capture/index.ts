export * from './driver';
export * from './capture-service';
