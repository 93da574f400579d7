import type { EngineRuntimeEvent } from "../../core/engine.js";

export type RunFeedItem =
	| { kind: "event"; event: EngineRuntimeEvent }
	| { kind: "output"; stepId: string; text: string };

type Listener = (item: RunFeedItem) => void;

/**
 * Bridges engine callbacks to the view. The engine starts emitting before
 * ink mounts, so items are buffered and replayed to each new subscriber.
 */
export class RunFeed {
	private readonly items: RunFeedItem[] = [];
	private readonly listeners = new Set<Listener>();

	push(item: RunFeedItem): void {
		this.items.push(item);
		for (const listener of this.listeners) {
			listener(item);
		}
	}

	subscribe(listener: Listener): () => void {
		for (const item of this.items) {
			listener(item);
		}
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}
}
