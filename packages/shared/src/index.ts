export * from './disasters';
export * from './geo';
export * from './state';
export * from './view';
export * from './controls';
