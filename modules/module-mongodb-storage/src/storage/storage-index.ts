export * from './implementation/db.js';
export * from './implementation/models.js';
export * from './implementation/MongoStorageProvider.js';
export * from './MongoControlPlaneStorage.js';
