// src/config/db.ts
import mongoose from 'mongoose';

export const connectDB = async (mongoURI: string | undefined): Promise<void> => {
  if (!mongoURI) {
    throw new Error('MongoDB connection string is not defined');
  }

  await mongoose.connect(mongoURI, { serverSelectionTimeoutMS: 5000 });
  console.log('[DB] MongoDB Connected');
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
  console.log('[DB] MongoDB Disconnected');
};

export default connectDB;
