import express from 'express';
import { sendError, validateExportBody, validateRequiredFields, validateSaveBody, validateUUIDParam } from '../middleware';
import { ValidationError } from '../errors';
import type { DocumentSessionService } from '../services/documentSessionService';

export function createDocumentRoutes(sessions: DocumentSessionService) {
  const router = express.Router();

  // Open a document from a local path
  router.post('/open', validateRequiredFields('path'), async (req, res) => {
    const { path } = req.body;
    if (typeof path !== 'string') {
      return sendError(res, 'OPEN_DOCUMENT', new ValidationError('path must be a string', 'path'));
    }
    try {
      const document = await sessions.open(path);
      return res.status(201).json({ document });
    } catch (error) {
      return sendError(res, 'OPEN_DOCUMENT', error);
    }
  });

  router.get('/:id', validateUUIDParam('id'), (req, res) => {
    try {
      return res.json({ document: sessions.get(req.params.id) });
    } catch (error) {
      return sendError(res, 'GET_DOCUMENT', error);
    }
  });

  // Page previews rendered so far
  router.get('/:id/previews', validateUUIDParam('id'), (req, res) => {
    try {
      return res.json(sessions.getPreviews(req.params.id));
    } catch (error) {
      return sendError(res, 'GET_PREVIEWS', error);
    }
  });

  // Save (or save as) with every shape written as an annotation
  router.post('/:id/save', validateUUIDParam('id'), validateSaveBody, async (req, res) => {
    try {
      const path = await sessions.save(req.params.id, req.body.shapes, req.body.destinationPath);
      return res.json({ path });
    } catch (error) {
      return sendError(res, 'SAVE_DOCUMENT', error);
    }
  });

  router.post('/:id/export', validateUUIDParam('id'), validateExportBody, async (req, res) => {
    try {
      const path = await sessions.exportSpreadsheet(req.params.id, req.body.sections, req.body.totalLabor);
      return res.json({ path });
    } catch (error) {
      return sendError(res, 'EXPORT_SPREADSHEET', error);
    }
  });

  router.delete('/:id', validateUUIDParam('id'), async (req, res) => {
    try {
      await sessions.close(req.params.id);
      return res.status(204).end();
    } catch (error) {
      return sendError(res, 'CLOSE_DOCUMENT', error);
    }
  });

  return router;
}
