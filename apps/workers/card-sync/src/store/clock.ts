import { setTimeout as delay } from "node:timers/promises";

export const CLOCK = "CLOCK";

export interface Clock {
	now(): Date;
	sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
	now: () => new Date(),
	sleep: async (ms) => {
		await delay(ms);
	},
};
