export * from './resource';
export * from './convert';
export { ImageIndex, shortId } from './image-index';
export { Image, imageRef, repositoryOf } from './image';
export { Container, observe } from './container';
export { Network, toNetworkRequest } from './network';
export { Volume } from './volume';
