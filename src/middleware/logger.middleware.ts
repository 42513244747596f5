import { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import { v4 as uuidv4 } from 'uuid';
import { stream } from '../utils/logger';

const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Tag each request with an id, echoed back in the response headers
 */
export const requestId = (req: Request, res: Response, next: NextFunction) => {
  const incoming = req.get(REQUEST_ID_HEADER);
  const id = incoming && incoming.length <= 128 ? incoming : uuidv4();
  res.locals.requestId = id;
  res.setHeader(REQUEST_ID_HEADER, id);
  next();
};

morgan.token('request-id', (_req, res) => res.getHeader(REQUEST_ID_HEADER)?.toString() ?? '-');

// HTTP access log into winston
export const httpLogger = morgan(
  ':request-id :remote-addr :method :url :status :res[content-length] - :response-time ms',
  { stream }
);
