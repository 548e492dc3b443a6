import type { Response } from 'express';

export function sendPdf(res: Response, filename: string, pdf: Buffer, disposition: 'inline' | 'attachment' = 'inline') {
  res.setHeader('Content-Type', 'application/pdf');
  res.setHeader('Content-Disposition', `${disposition}; filename="${filename}"`);
  res.send(pdf);
}
