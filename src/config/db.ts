import mongoose from 'mongoose';
import Logger from '../utils/logger';

/**
 * Open the MongoDB connection used by the trade store.
 */
const connectDB = async (uri: string): Promise<void> => {
    mongoose.set('strictQuery', true);
    try {
        await mongoose.connect(uri, { serverSelectionTimeoutMS: 10_000 });
        Logger.success('MongoDB connected');
    } catch (error) {
        Logger.error(`MongoDB connection failed: ${error instanceof Error ? error.message : String(error)}`);
        throw error;
    }
};

export const isDBConnected = (): boolean => mongoose.connection.readyState === 1;

export const closeDB = async (): Promise<void> => {
    if (mongoose.connection.readyState === 0) return;
    await mongoose.connection.close();
    Logger.info('MongoDB connection closed');
};

export default connectDB;
