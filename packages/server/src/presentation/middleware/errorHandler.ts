/**
 * Error Handler Middleware
 *
 * Express用のエラーハンドリングミドルウェア
 */

import type { Request, Response, NextFunction } from 'express';
import { DomainError } from '@dashcam/common-types';

/**
 * エラーハンドリングミドルウェア
 *
 * ドメインエラーを適切なHTTPステータスコードに変換してレスポンス
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // レスポンスが既に送信されている場合はデフォルトのエラーハンドラーに委譲
  if (res.headersSent) {
    return next(error);
  }

  console.error('[ErrorHandler]', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method,
  });

  const clientStatus = getClientErrorStatus(error);
  if (error instanceof DomainError) {
    handleDomainError(error, res);
  } else if (clientStatus !== null) {
    // express.json() の不正なJSONなど
    res.status(clientStatus).json({ error: error.message });
  } else {
    handleGenericError(error, res);
  }
}

/**
 * ドメインエラーをHTTPレスポンスに変換
 */
function handleDomainError(error: DomainError, res: Response): void {
  const statusCode = getStatusCodeForDomainError(error);

  res.status(statusCode).json({
    error: error.message,
    code: error.code,
  });
}

/**
 * ドメインエラーコードをHTTPステータスコードに変換
 */
function getStatusCodeForDomainError(error: DomainError): number {
  switch (error.code) {
    // 404 Not Found
    case 'CAMERA_NOT_FOUND':
      return 404;

    // 409 Conflict (録画中に開始要求)
    case 'RECORDER_BUSY':
      return 409;

    // 400 Bad Request
    // INVALID_STATE_TRANSITION はコントローラーが遷移前に状態を確認するため通常は届かない
    case 'INVALID_STATE_TRANSITION':
    case 'INVALID_OPERATION':
      return 400;

    // デフォルトは500
    default:
      return 500;
  }
}

/**
 * ボディパーサーなどが付与した 4xx ステータス
 */
function getClientErrorStatus(error: Error): number | null {
  if ('status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    return error.status;
  }
  return null;
}

/**
 * 汎用エラーをHTTPレスポンスに変換
 */
function handleGenericError(error: Error, res: Response): void {
  // 本番環境では詳細なエラーメッセージを隠す
  const isDevelopment = process.env.NODE_ENV === 'development';

  res.status(500).json({
    error: isDevelopment ? error.message : 'Internal server error',
    ...(isDevelopment && { stack: error.stack }),
  });
}

/**
 * 非同期ルートハンドラーをラップしてエラーを next() に渡す
 *
 * 使用例:
 * router.get('/path', asyncHandler(async (req, res) => {
 *   const result = await someAsyncOperation();
 *   res.json(result);
 * }));
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
