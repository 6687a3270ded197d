import { createHmac, timingSafeEqual } from "node:crypto";
import type { IncomingMessage, Server } from "node:http";
import express, { type Request, type Response } from "express";
import { classifyOneBotPayload, parseOneBotGroupCommand } from "../domain/event-classifier.js";
import type { BlacklistCommandContext } from "../handlers/command-handler.js";
import type { GuardEventHandler } from "../handlers/guard-event-handler.js";
import { type Either, isLeft } from "../lib/either.js";
import { createKeyedLock } from "../utils/keyed-lock.js";

/**
 * Outbound messaging the webhook needs from the OneBot client
 */
export interface OneBotGroupMessenger {
	sendGroupMessage(groupId: string, message: string): Promise<Either<Error, unknown>>;
}

export interface OneBotWebhookDependencies {
	handleEvent: GuardEventHandler;
	handleBlacklistCommand: (ctx: BlacklistCommandContext) => Promise<void>;
	messenger: OneBotGroupMessenger;
	/** HMAC-SHA1 secret configured on the OneBot side; unsigned requests are accepted when absent */
	secret?: string;
}

export interface OneBotWebhookOptions {
	port?: number;
	host?: string;
	path?: string;
}

/**
 * Checks the `X-Signature: sha1=<hex>` header OneBot v11 adds when a secret is set
 */
export const verifyOneBotSignature = (secret: string, rawBody: Buffer, header: string | undefined): boolean => {
	if (!header?.startsWith("sha1=")) {
		return false;
	}
	const expected = Buffer.from(createHmac("sha1", secret).update(rawBody).digest("hex"), "utf8");
	const received = Buffer.from(header.slice("sha1=".length), "utf8");
	return expected.length === received.length && timingSafeEqual(expected, received);
};

/**
 * HTTP server receiving OneBot v11 events in HTTP-POST mode
 * Answers 204 once the event is handled; notices go out through `send_group_msg`.
 */
export class OneBotWebhookServer {
	private app: express.Application;
	private server: Server | null = null;
	private readonly rawBodies = new WeakMap<IncomingMessage, Buffer>();
	// Events of one group are handled one at a time, in arrival order
	private readonly groupLock = createKeyedLock();
	private readonly port: number;
	private readonly host: string;
	private readonly path: string;

	constructor(
		private readonly deps: OneBotWebhookDependencies,
		options: OneBotWebhookOptions = {},
	) {
		this.port = options.port ?? 3000;
		this.host = options.host ?? "0.0.0.0";
		this.path = options.path ?? "/onebot";
		this.app = express();
		this.app.use(
			express.json({
				limit: "1mb",
				verify: (req, _res, buf) => {
					this.rawBodies.set(req, buf);
				},
			}),
		);
		this.setupRoutes();
	}

	private setupRoutes(): void {
		// Health check endpoint
		this.app.get("/health", (_req: Request, res: Response) => {
			res.json({ status: "ok" });
		});

		this.app.post(this.path, async (req: Request, res: Response) => {
			if (this.deps.secret) {
				const rawBody = this.rawBodies.get(req) ?? Buffer.alloc(0);
				if (!verifyOneBotSignature(this.deps.secret, rawBody, req.get("X-Signature"))) {
					console.warn("[WARN] onebot-webhook: Rejected event with invalid signature");
					res.status(401).json({ error: "invalid signature" });
					return;
				}
			}

			try {
				await this.dispatch(req.body);
				res.status(204).end();
			} catch (error) {
				console.error("[ERROR] onebot-webhook: Error processing event:", error);
				res.status(500).json({
					error: error instanceof Error ? error.message : String(error),
				});
			}
		});
	}

	private async dispatch(payload: unknown): Promise<void> {
		const command = parseOneBotGroupCommand(payload);
		if (command) {
			if (command.command === "blacklist") {
				await this.deps.handleBlacklistCommand({
					groupId: command.groupId,
					reply: (text) => this.reply(command.groupId, text),
				});
			}
			return;
		}

		const event = classifyOneBotPayload(payload);
		if (event.kind === "ignore") {
			return;
		}

		await this.groupLock.run(event.groupId, () =>
			this.deps.handleEvent({
				event,
				reply: (text) => this.reply(event.groupId, text),
			}),
		);
	}

	private async reply(groupId: string, text: string): Promise<unknown> {
		const result = await this.deps.messenger.sendGroupMessage(groupId, text);
		if (isLeft(result)) {
			throw result[0];
		}
		return result[1];
	}

	async start(): Promise<number> {
		return new Promise((resolve, reject) => {
			const server = this.app.listen(this.port, this.host, () => {
				const address = server.address();
				const port = typeof address === "object" && address ? address.port : this.port;
				console.log(`[DEBUG] onebot-webhook: Listening on ${this.host}:${port}${this.path}`);
				resolve(port);
			});
			server.once("error", reject);
			this.server = server;
		});
	}

	async close(): Promise<void> {
		return new Promise((resolve, reject) => {
			if (!this.server) {
				resolve();
				return;
			}

			this.server.close((err) => {
				if (err) {
					reject(err);
				} else {
					console.log("[DEBUG] onebot-webhook: Server closed");
					this.server = null;
					resolve();
				}
			});
		});
	}
}
