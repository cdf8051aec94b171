export * from './credentials';
export * from './errors';
export * from './requests';
export * from './responses';
export * from './pagination';
export * from './config';
export * from './controlPlane.client';
export * from './factory';
