export type SyncOptions = {
	configPath?: string;
	storageDirOverride?: string;
	dryRun: boolean;
	verbose?: boolean;
	repositoryFilter?: string[];
	timeoutMs?: number;
};

export type SyncSummary = {
	repositoryId: string;
	url: string;
	archs: string[];
	downloaded: number;
	recycled: number;
	skipped: number;
	metadataFiles: number;
	bytesDownloaded: number;
	checksumWarnings: number;
};

export type SyncPlanSummary = {
	repositoryId: string;
	url: string;
	archs: string[];
	toDownload: string[];
	toRecycle: string[];
	skipped: Array<{ location: string; reason: string }>;
};
