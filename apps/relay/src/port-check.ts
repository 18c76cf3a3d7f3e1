import { createServer } from "node:net";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Probes `host:port` by binding it briefly. Port 0 always reports free since
 * the kernel picks an unused port at listen time.
 */
export function isPortAvailable(host: string, port: number): Promise<boolean> {
  if (port === 0) {
    return Promise.resolve(true);
  }

  return new Promise<boolean>((resolve, reject) => {
    const probe = createServer();

    probe.once("error", (error) => {
      if (isErrnoException(error) && (error.code === "EADDRINUSE" || error.code === "EACCES")) {
        resolve(false);
        return;
      }
      reject(error);
    });

    probe.once("listening", () => {
      probe.close(() => {
        resolve(true);
      });
    });

    probe.listen({ host, port, exclusive: true });
  });
}

export function isAddressInUseError(error: unknown): boolean {
  return isErrnoException(error) && error.code === "EADDRINUSE";
}
