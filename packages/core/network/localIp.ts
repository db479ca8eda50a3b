import dgram from "node:dgram";
import { createLogger } from "../logger";
import { errorMessage } from "../errors";

const log = createLogger("network");

export const FALLBACK_IP = "127.0.0.1";

/**
 * LAN address of the default route. Connecting a UDP socket only selects the
 * outgoing interface; nothing is sent.
 */
export function getLocalIp(probeHost = "8.8.8.8"): Promise<string> {
  return new Promise((resolve) => {
    const socket = dgram.createSocket("udp4");
    const done = (ip: string) => {
      socket.close();
      resolve(ip);
    };
    socket.on("error", (err) => {
      log.debug("Local IP probe failed:", errorMessage(err));
      done(FALLBACK_IP);
    });
    socket.connect(80, probeHost, () => {
      try {
        done(socket.address().address);
      } catch (err) {
        log.debug("Local IP probe failed:", errorMessage(err));
        done(FALLBACK_IP);
      }
    });
  });
}
