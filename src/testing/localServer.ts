import http from "node:http";

export type RouteHandler = (req: http.IncomingMessage, res: http.ServerResponse) => void;

export interface LocalServer {
  baseUrl: string;
  hits: string[];
  close(): Promise<void>;
}

/** Starts an HTTP server on 127.0.0.1 with an ephemeral port; unknown paths get 404. */
export async function startLocalServer(routes: Record<string, RouteHandler>): Promise<LocalServer> {
  const hits: string[] = [];
  const server = http.createServer((req, res) => {
    const pathname = req.url ?? "/";
    hits.push(pathname);
    const handler = routes[pathname];
    if (!handler) {
      res.statusCode = 404;
      res.end("not found");
      return;
    }
    handler(req, res);
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("local server is not listening on a TCP port");
  }
  const { port } = address;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    hits,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

export function sendPdf(body = "%PDF-1.4\ntest document\n%%EOF\n"): RouteHandler {
  return (_req, res) => {
    res.statusCode = 200;
    res.setHeader("content-type", "application/pdf");
    res.end(body);
  };
}

export function redirectTo(location: string, status = 302): RouteHandler {
  return (_req, res) => {
    res.statusCode = status;
    res.setHeader("location", location);
    res.end();
  };
}
