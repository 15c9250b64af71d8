import * as dgram from "node:dgram";
import type { Logger, PortProbe, ProbeOutcome } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";
import { formatError } from "../utils/index.js";

const PROBE_PAYLOAD = Buffer.from([0]);

/**
 * UDP reachability probe.
 *
 * UDP has no handshake: the datagram is sent from a connected socket and
 * an ICMP port-unreachable surfaces as ECONNREFUSED. Silence until the
 * timeout is taken as reachable, the same verdict `nc -zu` gives.
 */
export class UdpPortProbe implements PortProbe {
	private readonly logger: Logger;

	constructor(logger?: Logger) {
		this.logger = logger ?? new LoggerImpl("port-probe");
	}

	probe(host: string, port: number, timeoutMs: number): Promise<ProbeOutcome> {
		return new Promise<ProbeOutcome>((resolve) => {
			const socket = dgram.createSocket("udp4");
			let timerId: ReturnType<typeof setTimeout> | null = null;
			let settled = false;

			const finish = (outcome: ProbeOutcome): void => {
				if (settled) {
					return;
				}
				settled = true;
				if (timerId !== null) {
					clearTimeout(timerId);
					timerId = null;
				}
				socket.close();
				this.logger.debug(`Probe ${host}:${port}/udp: ${outcome.detail}`);
				resolve(outcome);
			};

			socket.on("error", (err) => {
				finish({ reachable: false, detail: formatError(err) });
			});

			socket.on("message", () => {
				finish({ reachable: true, detail: "response received" });
			});

			// Without a connect callback, lookup failures arrive as "error"
			socket.once("connect", () => {
				socket.send(PROBE_PAYLOAD, (err) => {
					if (err) {
						finish({ reachable: false, detail: formatError(err) });
						return;
					}
					timerId = setTimeout(() => {
						finish({ reachable: true, detail: `no rejection within ${timeoutMs}ms` });
					}, timeoutMs);
				});
			});

			socket.connect(port, host);
		});
	}
}
