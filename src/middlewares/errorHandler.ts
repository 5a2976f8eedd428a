import { Request, Response, NextFunction } from 'express';
import { escapeHtml } from '@/lib/template.utils';

// body-parser and http-errors style errors carry their own status
const statusOf = (err: unknown): number => {
  if (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return 500;
};

// eslint-disable-next-line @typescript-eslint/no-unused-vars
export const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  const error = err instanceof Error ? err : new Error(String(err));
  console.error('Error occurred:', error.stack || error);

  const statusCode = statusOf(err);
  const message = statusCode < 500 ? error.message : 'Internal Server Error';
  const stack = process.env.NODE_ENV === 'development' && error.stack ? `<pre>${escapeHtml(error.stack)}</pre>` : '';

  res
    .status(statusCode)
    .type('html')
    .send(`<html><body><h1>${statusCode}</h1><p>${escapeHtml(message)}</p>${stack}<p><a href="/">Back to home</a></p></body></html>`);
};

export const notFoundHandler = (req: Request, res: Response) => {
  res
    .status(404)
    .type('html')
    .send('<html><body><h1>404</h1><p>Page not found</p><p><a href="/">Back to home</a></p></body></html>');
};
