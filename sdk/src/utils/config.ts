import type { Prettify } from "viem";

type MergeDefaults<T extends object, D extends object> = Prettify<{
	[K in keyof T | keyof D]: K extends keyof T
		? undefined extends T[K]
			? // Optional in T: the default fills the gap
				Exclude<T[K], undefined> | (K extends keyof D ? D[K] : never)
			: T[K]
		: K extends keyof D
			? D[K]
			: never;
}>;

export const withDefaults = <T extends object, D extends object>(config: T, defaultValues: D): MergeDefaults<T, D> => {
	const merged = { ...defaultValues } as MergeDefaults<T, D>;
	const keys = Object.keys(config) as Array<keyof T>;
	for (const key of keys) {
		const value = config[key];
		if (value !== undefined) {
			// Only keys of T are written here, so T's view of merged is sound.
			(merged as T)[key] = value;
		}
	}
	return merged;
};
