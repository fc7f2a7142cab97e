import { Request, Response } from 'express';

import { HttpStatus } from '../config';
import { SummaryRequestSchema } from '../validation/schemas';
import { summarizeWorkouts } from './workouts';

/**
 * Handle a batch summary request.
 * Responds 200 when every reading was summarized, 207 on partial success
 * and 400 when no reading could be summarized.
 */
export const summarizeRequest = (req: Request, res: Response) => {
  const { log } = req;
  const timer = log.startTimer('summarizeRequest');

  try {
    const parseResult = SummaryRequestSchema.safeParse(req.body);
    if (!parseResult.success) {
      log.warn('Invalid request body', { errors: parseResult.error.issues });
      res.status(HttpStatus.BAD_REQUEST).json({
        error: 'Invalid request format',
        details: parseResult.error.issues,
      });
      return;
    }

    const { packages } = parseResult.data;
    log.info('Processing summary request', { packageCount: packages.length });

    const response = summarizeWorkouts(packages, log);

    if (response.succeeded === 0) {
      timer.end('warn', 'No workout could be summarized', { failed: response.failed });
      res.status(HttpStatus.BAD_REQUEST).json(response);
      return;
    }

    const hasErrors = response.failed > 0;
    timer.end(hasErrors ? 'warn' : 'info', 'Summary request completed', {
      failed: response.failed,
      succeeded: response.succeeded,
    });

    res.status(hasErrors ? HttpStatus.MULTI_STATUS : HttpStatus.OK).json(response);
  } catch (error) {
    timer.end('error', 'Failed to process summary request', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      error: 'Failed to process request',
      message: error instanceof Error ? error.message : 'An error occurred',
    });
  }
};
