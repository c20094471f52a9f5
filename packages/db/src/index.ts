import mongoose from 'mongoose';

export { mongoose };
export { AlertRecord, toAlertRecordFields } from './models/AlertRecord.js';
export type { AlertRecordDocument } from './models/AlertRecord.js';

export async function connectDB(uri: string): Promise<typeof mongoose> {
  return mongoose.connect(uri);
}

export async function disconnectDB(): Promise<void> {
  await mongoose.disconnect();
}
