export * from './message.enum';
export * from './garment-category.enum';
