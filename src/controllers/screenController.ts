import { Request, Response } from 'express';
import { adminScreens, isScreenEntity } from '../config/adminScreens';

export const getScreens = (req: Request, res: Response) => {
  res.json({ data: adminScreens });
};

export const getScreen = (req: Request, res: Response) => {
  const { entity } = req.params;

  if (!isScreenEntity(entity)) {
    return res.status(404).json({ message: 'Screen not found' });
  }

  res.json(adminScreens[entity]);
};
