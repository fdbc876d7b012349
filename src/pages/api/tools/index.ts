// pages/api/tools/index.ts
import { NextApiRequest, NextApiResponse } from 'next';
import { getServices } from '../../../services/ServiceInitializer';
import { handleError } from '../../../utils/errorHandler';

export default async function handler(
  req: NextApiRequest,
  res: NextApiResponse,
) {
  if (req.method !== 'GET') {
    return res.status(405).json({ message: 'Method not allowed' });
  }

  try {
    const { registry } = getServices();
    return res.status(200).json({ tools: registry.list() });
  } catch (error) {
    return handleError(error, res);
  }
}
