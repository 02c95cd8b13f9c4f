/**
 * Inspection Record Routes
 *
 * HTTP shell over the storage core: create, close and reopen records with
 * photo uploads, filtered listing, summary counts, evidence access and the
 * CSV export.
 *
 * Transition guards live here, not in the core: closing a Closed record and
 * reopening anything but a Closed record are rejected with 409.
 */

import path from 'path';
import { Router, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import {
  closeRecordSchema,
  insertInspectionRecordSchema,
  reopenRecordSchema,
  type Evidence,
  type EvidenceUpload,
  type RecordFilter,
} from '@shared/schema';
import { canTransition, type RecordTransition } from '@shared/recordLifecycle';
import type { IStorage } from '../storage';
import { CSV_FILENAME, generateCsvExport } from '../services/csvExport';
import { InvalidTransitionError, RecordNotFoundError } from '../lib/errors';
import { createLogger, loggers, logTiming } from '../lib/logger';
import { createApiError, errors } from '../middleware/errorHandler';
import {
  evidenceParamSchema,
  evidencePhaseQuerySchema,
  recordFilterQuerySchema,
  recordIdParamSchema,
  type RecordFilterQuery,
} from '../middleware/queryValidation';
import { sendCreated, sendSuccess } from '../middleware/responseHelpers';
import { parseBody, parseParams, parseQuery } from '../middleware/validation';

const log = createLogger({ module: 'records-routes' });

export const PHOTO_FIELD = 'photos';
export const MAX_PHOTOS_PER_REQUEST = 20;
export const MAX_PHOTO_BYTES = 20 * 1024 * 1024;
export const ACCEPTED_PHOTO_TYPES: readonly string[] = ['image/jpeg', 'image/png'];
const DEFAULT_PHOTO_TYPE = 'image/jpeg';
export const ACCEPTED_PHOTO_EXTENSIONS: readonly string[] = ['.jpg', '.jpeg', '.png'];

// What the multipart parser reports for a part sent without a Content-Type
const UNTYPED_PARTS: readonly string[] = ['', 'text/plain', 'application/octet-stream'];

/**
 * Mime type to store for an uploaded photo, or null when it is not accepted.
 * Untyped parts are accepted by file extension and stored as JPEG.
 */
export function resolvePhotoType(mimetype: string, filename: string): string | null {
  if (ACCEPTED_PHOTO_TYPES.includes(mimetype)) {
    return mimetype;
  }
  const extension = path.extname(filename).toLowerCase();
  if (UNTYPED_PARTS.includes(mimetype) && ACCEPTED_PHOTO_EXTENSIONS.includes(extension)) {
    return DEFAULT_PHOTO_TYPE;
  }
  return null;
}

// Memory storage: the bytes go straight into the database
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: MAX_PHOTO_BYTES,
    files: MAX_PHOTOS_PER_REQUEST,
  },
  fileFilter: (_req, file, cb) => {
    if (resolvePhotoType(file.mimetype, file.originalname)) {
      cb(null, true);
    } else {
      cb(errors.badRequest(`File type ${file.mimetype} not allowed`, {
        filename: file.originalname,
        accepted: ACCEPTED_PHOTO_TYPES,
      }));
    }
  },
});

/**
 * multer.array with its limit errors reported as 400 instead of 500.
 */
function acceptPhotos(req: Request, res: Response, next: NextFunction): void {
  upload.array(PHOTO_FIELD, MAX_PHOTOS_PER_REQUEST)(req, res, (err?: unknown) => {
    if (err instanceof multer.MulterError) {
      return next(createApiError(err.message, 400, 'UPLOAD_REJECTED', {
        reason: err.code,
        field: err.field,
      }));
    }
    next(err);
  });
}

function uploadedPhotos(req: Request): EvidenceUpload[] {
  const files = Array.isArray(req.files) ? req.files : [];
  return files.map((file) => ({
    payload: file.buffer,
    filename: file.originalname || null,
    mimeType: resolvePhotoType(file.mimetype, file.originalname) ?? DEFAULT_PHOTO_TYPE,
  }));
}

function toRecordFilter(query: RecordFilterQuery): RecordFilter {
  return {
    statuses: query.status,
    severities: query.severity,
    area: query.area,
    inspector: query.inspector,
  };
}

function describeEvidence(item: Evidence) {
  return {
    id: item.id,
    recordId: item.recordId,
    phase: item.phase,
    filename: item.filename,
    mimeType: item.mimeType,
    size: item.payload.length,
  };
}

export function createRecordsRouter(storage: IStorage): Router {
  const router = Router();

  /** Load the record and reject the transition unless its current status allows it. */
  function requireTransition(id: number, transition: RecordTransition): void {
    const current = storage.getRecord(id);
    if (!current) {
      throw new RecordNotFoundError(id);
    }
    if (!canTransition(current.status, transition)) {
      throw new InvalidTransitionError(id, transition, current.status);
    }
  }

  /**
   * GET /api/records
   * Query: status, severity (repeatable or comma-separated), area, inspector
   */
  router.get('/', (req: Request, res: Response) => {
    const query = parseQuery(recordFilterQuerySchema, req.query);
    sendSuccess(res, storage.listRecords(toRecordFilter(query)));
  });

  /**
   * GET /api/records/summary
   * Record counts per status
   */
  router.get('/summary', (_req: Request, res: Response) => {
    sendSuccess(res, storage.getSummary());
  });

  /**
   * GET /api/records/export.csv
   * Same filters as the list. Photos are never exported.
   */
  router.get('/export.csv', (req: Request, res: Response) => {
    const started = Date.now();
    const query = parseQuery(recordFilterQuerySchema, req.query);
    const records = storage.listRecords(toRecordFilter(query));
    const csv = generateCsvExport(records, { withBom: true });

    logTiming(loggers.export, 'CSV export', started, { count: records.length });

    res.attachment(CSV_FILENAME);
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.send(csv);
  });

  /**
   * GET /api/records/:id
   * Record plus photo counts per phase
   */
  router.get('/:id', (req: Request, res: Response) => {
    const { id } = parseParams(recordIdParamSchema, req.params);
    const record = storage.getRecord(id);
    if (!record) {
      throw new RecordNotFoundError(id);
    }
    sendSuccess(res, { record, evidence: storage.countEvidence(id) });
  });

  /**
   * POST /api/records
   * Body (multipart/form-data): record fields + photos[] (opening evidence)
   */
  router.post('/', acceptPhotos, (req: Request, res: Response) => {
    const fields = parseBody(insertInspectionRecordSchema, req.body);
    const photos = uploadedPhotos(req);

    const id = storage.createRecord(fields, photos);
    const record = storage.getRecord(id);

    (req.logger ?? log).info({ recordId: id, photos: photos.length }, 'RNC created via API');
    sendCreated(res, record, `RNC #${id} saved (status: Open)`);
  });

  /**
   * POST /api/records/:id/close
   * Body (multipart/form-data): closedBy, notes, effectiveness + photos[]
   */
  router.post('/:id/close', acceptPhotos, (req: Request, res: Response) => {
    const { id } = parseParams(recordIdParamSchema, req.params);
    const closure = parseBody(closeRecordSchema, req.body);

    requireTransition(id, 'close');

    const record = storage.closeRecord(id, closure, uploadedPhotos(req));
    sendSuccess(res, record, `RNC #${id} closed`);
  });

  /**
   * POST /api/records/:id/reopen
   * Body (multipart/form-data): reopenedBy, reason + photos[]
   */
  router.post('/:id/reopen', acceptPhotos, (req: Request, res: Response) => {
    const { id } = parseParams(recordIdParamSchema, req.params);
    const reopening = parseBody(reopenRecordSchema, req.body);

    requireTransition(id, 'reopen');

    const record = storage.reopenRecord(id, reopening, uploadedPhotos(req));
    sendSuccess(res, record, `RNC #${id} reopened, status back to In Action`);
  });

  /**
   * GET /api/records/:id/evidence?phase=opening|closing|reopening
   * Photo metadata only; bytes are served by the /raw route
   */
  router.get('/:id/evidence', (req: Request, res: Response) => {
    const { id } = parseParams(recordIdParamSchema, req.params);
    const { phase } = parseQuery(evidencePhaseQuerySchema, req.query);
    if (!storage.getRecord(id)) {
      throw new RecordNotFoundError(id);
    }
    sendSuccess(res, storage.listEvidence(id, phase).map(describeEvidence));
  });

  /**
   * GET /api/records/:id/evidence/:evidenceId/raw
   * Stored bytes, unmodified, with the stored mime type
   */
  router.get('/:id/evidence/:evidenceId/raw', (req: Request, res: Response) => {
    const { id, evidenceId } = parseParams(evidenceParamSchema, req.params);
    const item = storage.getEvidence(id, evidenceId);
    if (!item) {
      throw errors.notFound(`Evidence #${evidenceId} of record #${id}`);
    }
    res.type(item.mimeType ?? 'application/octet-stream');
    res.send(item.payload);
  });

  return router;
}
