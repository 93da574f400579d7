export function deepFreeze<T>(value: T): Readonly<T> {
	if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
		return value;
	}
	for (const key of Object.keys(value)) {
		deepFreeze(Reflect.get(value, key));
	}
	return Object.freeze(value);
}
