export { StatsStore, createDefaultStats, cloneStats } from './statsStore';
export type { UserStatistics, SerializedUserStatistics } from './types';
