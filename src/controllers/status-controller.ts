import { NextFunction, Request, Response } from "express";
import { PersistedState } from "../models/address-data";
import { MonitorStatus } from "../services/monitor-service";

/**
 * What the status endpoints read from the running monitor
 */
export interface StatusSource {
  getStatus(): MonitorStatus;
  loadState(): Promise<PersistedState | null>;
}

export function createStatusController(source: StatusSource) {
  return {
    health(req: Request, res: Response) {
      res.status(200).json({ status: "UP" });
    },

    async status(req: Request, res: Response, next: NextFunction) {
      try {
        const state = await source.loadState();
        res.status(200).json({ ...source.getStatus(), state });
      } catch (error) {
        next(error);
      }
    },
  };
}

export type StatusController = ReturnType<typeof createStatusController>;
