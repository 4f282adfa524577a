import type { Request, Response } from "express";

export interface AssetHttpAdapter {
  upload(req: Request, res: Response): Promise<void>;
  getFile(req: Request, res: Response): Promise<void>;
  delete(req: Request, res: Response): Promise<void>;
}
