import type { RecordView } from "../core/binary-codec";
import type { Stage } from "../game/enums";
import { FrameAssembler, type AssembledFrame } from "../game/frame-assembler";
import { PostFrameCorrector } from "../game/post-frame-corrector";
import { DecoderSession } from "../game/session";
import type { Snapshot } from "../game/snapshot";
import { loadStaticTables } from "../game/tables/load-tables";
import type { StaticTables } from "../game/tables/static-tables";
import {
	decodeFrameBookend,
	decodeItemUpdate,
	decodeMenuFrame,
	decodePostFrame,
	decodePreFrame,
	decodeSessionEnd,
	decodeSessionStart,
	type SessionEndInfo,
	type SessionStartInfo,
} from "../protocol/decoders";
import { DispatchStatus, EventDispatcher, type EventHandlers } from "../protocol/dispatcher";
import type { FrameStreamConfig, StreamSource } from "./types";

/**
 * Configuration for FrameStream
 */
export interface FrameStreamOptions {
	/** Where the raw event bytes come from */
	source: StreamSource;

	/** Static lookup tables (default: the bundled JSON tables) */
	tables?: StaticTables;

	/** Stream configuration */
	config?: FrameStreamConfig;
}

/**
 * Decodes a raw event stream into one snapshot per completed frame.
 *
 * @example
 * ```ts
 * const stream = new FrameStream({ source: openFileSource("match.bin") });
 *
 * stream.onSessionStart((info) => console.log(`version ${info.version}`));
 *
 * for await (const snapshot of stream) {
 *   console.log(snapshot.frame, snapshot.distance);
 * }
 * ```
 */
export class FrameStream {
	private source: StreamSource;
	private config: Required<FrameStreamConfig>;
	private session: DecoderSession;
	private assembler: FrameAssembler;
	private dispatcher: EventDispatcher;

	/** Bytes received but not yet consumed by the dispatcher */
	private buffer: Uint8Array = new Uint8Array(0);

	private frameHandlers: Array<(snapshot: Snapshot) => void> = [];
	private sessionStartHandlers: Array<(info: SessionStartInfo) => void> = [];
	private sessionEndHandlers: Array<(info: SessionEndInfo) => void> = [];

	constructor(options: FrameStreamOptions) {
		this.source = options.source;
		this.config = {
			debug: options.config?.debug ?? false,
			pollingMode: options.config?.pollingMode ?? false,
			allowOldVersion: options.config?.allowOldVersion ?? false,
		};

		const tables = options.tables ?? loadStaticTables();
		this.session = new DecoderSession(tables, { allowOldVersion: this.config.allowOldVersion });
		this.assembler = new FrameAssembler(this.session, new PostFrameCorrector(tables));
		this.dispatcher = new EventDispatcher(this.session, this.createHandlers());
	}

	/** Protocol version from the latest session start, or "unknown" */
	get version(): string {
		return this.session.version;
	}

	/** Whether frame boundaries are synthesized from frame-index changes */
	get legacyBookends(): boolean {
		return this.session.legacyBookends;
	}

	get stage(): Stage {
		return this.session.stage;
	}

	/** Number of received bytes still waiting for the rest of their record */
	get bufferedBytes(): number {
		return this.buffer.byteLength;
	}

	/**
	 * Decode up to the next completed frame.
	 *
	 * In blocking mode, waits for input as needed and resolves null once the
	 * source has ended. In polling mode, resolves null as soon as the source
	 * has nothing buffered.
	 *
	 * @throws ProtocolError when the stream cannot be decoded
	 */
	async step(): Promise<Snapshot | null> {
		for (;;) {
			const snapshot = this.drain();
			if (snapshot) return snapshot;

			const chunk = this.config.pollingMode ? this.source.poll() : await this.source.read();
			if (chunk === null) return null;
			this.append(chunk);
		}
	}

	/**
	 * Iterate snapshots until `step()` resolves null
	 */
	async *[Symbol.asyncIterator](): AsyncGenerator<Snapshot, void, undefined> {
		for (;;) {
			const snapshot = await this.step();
			if (!snapshot) return;
			yield snapshot;
		}
	}

	/**
	 * Register a handler for every emitted snapshot
	 * @returns Unsubscribe function to remove this handler
	 */
	onFrame(handler: (snapshot: Snapshot) => void): () => void {
		this.frameHandlers.push(handler);
		return () => {
			const index = this.frameHandlers.indexOf(handler);
			if (index > -1) this.frameHandlers.splice(index, 1);
		};
	}

	/**
	 * Register a handler for session starts
	 * @returns Unsubscribe function to remove this handler
	 */
	onSessionStart(handler: (info: SessionStartInfo) => void): () => void {
		this.sessionStartHandlers.push(handler);
		return () => {
			const index = this.sessionStartHandlers.indexOf(handler);
			if (index > -1) this.sessionStartHandlers.splice(index, 1);
		};
	}

	/**
	 * Register a handler for session ends
	 * @returns Unsubscribe function to remove this handler
	 */
	onSessionEnd(handler: (info: SessionEndInfo) => void): () => void {
		this.sessionEndHandlers.push(handler);
		return () => {
			const index = this.sessionEndHandlers.indexOf(handler);
			if (index > -1) this.sessionEndHandlers.splice(index, 1);
		};
	}

	/**
	 * Stop decoding and close the source
	 */
	close(): void | Promise<void> {
		this.log("Closing stream");
		this.buffer = new Uint8Array(0);
		this.assembler.reset();
		return this.source.close();
	}

	/**
	 * Dispatch buffered bytes until a frame is emitted or more input is needed
	 */
	private drain(): Snapshot | null {
		for (;;) {
			const result = this.dispatcher.dispatch(this.buffer);
			this.buffer = this.buffer.subarray(result.consumed);

			if (result.status !== DispatchStatus.FrameComplete) return null;

			const assembled: AssembledFrame =
				result.signal === "menu" ? this.assembler.completeMenuFrame() : this.assembler.completeFrame();

			switch (assembled.kind) {
				case "emitted":
					this.notifyFrameHandlers(assembled.snapshot);
					return assembled.snapshot;
				case "dropped":
					this.log(`Dropped frame ${assembled.frame} (last delivered: ${this.session.lastDeliveredFrame})`);
					break;
				case "empty":
					break;
			}
		}
	}

	private append(chunk: Uint8Array): void {
		if (this.buffer.byteLength === 0) {
			this.buffer = chunk;
			return;
		}
		const merged = new Uint8Array(this.buffer.byteLength + chunk.byteLength);
		merged.set(this.buffer, 0);
		merged.set(chunk, this.buffer.byteLength);
		this.buffer = merged;
	}

	/**
	 * Wire each record type to its decoder
	 */
	private createHandlers(): EventHandlers {
		return {
			onSessionStart: (record: RecordView) => {
				const info = decodeSessionStart(this.session, record);
				this.assembler.reset();
				this.log(
					`Session started (version: ${info.version}, stage: ${info.stage}, legacy: ${info.legacyBookends})`
				);
				this.notifySessionStartHandlers(info);
			},
			onSessionEnd: (record) => {
				const info = decodeSessionEnd(record);
				this.log(`Session ended (method: ${info.endMethod})`);
				this.notifySessionEndHandlers(info);
			},
			onPreFrame: (record) => decodePreFrame(this.session, record, this.assembler.snapshot()),
			onPostFrame: (record) => decodePostFrame(this.session, record, this.assembler.snapshot()),
			onItemUpdate: (record) => decodeItemUpdate(this.session, record, this.assembler.snapshot()),
			onFrameBookend: (record) => decodeFrameBookend(record, this.assembler.snapshot()),
			onMenuFrame: (record) => decodeMenuFrame(this.session, record, this.assembler.snapshot()),
			onSkipped: (command, length) => {
				this.log(`Skipped command 0x${command.toString(16)} (${length} bytes)`);
			},
		};
	}

	private notifyFrameHandlers(snapshot: Snapshot): void {
		for (const handler of this.frameHandlers) {
			try {
				handler(snapshot);
			} catch (error) {
				// Don't call log here as it might throw, use console.error directly
				if (this.config.debug) {
					console.error(`[FrameStream] Error in frame handler: ${error}`);
				}
			}
		}
	}

	private notifySessionStartHandlers(info: SessionStartInfo): void {
		for (const handler of this.sessionStartHandlers) {
			try {
				handler(info);
			} catch (error) {
				if (this.config.debug) {
					console.error(`[FrameStream] Error in session start handler: ${error}`);
				}
			}
		}
	}

	private notifySessionEndHandlers(info: SessionEndInfo): void {
		for (const handler of this.sessionEndHandlers) {
			try {
				handler(info);
			} catch (error) {
				if (this.config.debug) {
					console.error(`[FrameStream] Error in session end handler: ${error}`);
				}
			}
		}
	}

	/**
	 * Log debug messages
	 */
	private log(message: string): void {
		if (this.config.debug) {
			console.log(`[FrameStream] ${message}`);
		}
	}
}
