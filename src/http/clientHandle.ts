import type { Request, Response } from "express";
import type { ClientHandle } from "../queue/types.js";

/**
 * Liveness of an HTTP caller: gone once the response closes before it was
 * finished, or the socket is destroyed.
 */
export class HttpClientHandle implements ClientHandle {
  private closedEarly = false;
  private readonly req: Request;

  public constructor(req: Request, res: Response) {
    this.req = req;
    res.once("close", () => {
      if (!res.writableFinished) {
        this.closedEarly = true;
      }
    });
  }

  public async isConnected(): Promise<boolean> {
    if (this.closedEarly) {
      return false;
    }
    return !this.req.socket.destroyed;
  }
}
