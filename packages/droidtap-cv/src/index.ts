export * from './detectors/ocr/ocr-detector';
export * from './detectors/ocr/text-similarity';
export * from './services/vision-client.service';
export * from './services/vision-model.client';
export * from './services/vision-reply.parser';
export * from './utils/image-scaler';
