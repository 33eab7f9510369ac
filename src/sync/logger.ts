export type SyncLogger = {
	debug: (message: string) => void;
	info: (message: string) => void;
	warn: (message: string) => void;
};

export const silentLogger: SyncLogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
};
