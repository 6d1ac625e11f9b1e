import { Router, type Response } from 'express';
import {
  handleLabels,
  handleList,
  handleSend,
  handleSpam,
  handleSummary,
  type MailHandlerDeps,
} from '../handlers/mailHandlers';
import type { HandlerResult } from '../types/api';

export function sendResult<T>(res: Response, result: HandlerResult<T>): void {
  res.status(result.status).json(result.body);
}

export function createGmailRouter(deps: MailHandlerDeps): Router {
  const router = Router();

  router.post('/send', async (req, res) => {
    sendResult(res, await handleSend(req.body, deps));
  });

  router.get('/list', async (req, res) => {
    sendResult(res, await handleList(req.query, deps));
  });

  router.get('/summary', async (req, res) => {
    sendResult(res, await handleSummary(req.query, deps));
  });

  router.post('/spam', async (req, res) => {
    sendResult(res, await handleSpam(req.body, deps));
  });

  router.post('/labels', async (req, res) => {
    sendResult(res, await handleLabels(req.body, deps));
  });

  return router;
}
