/**
 * ドメインエラーの基底クラス
 */
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = this.constructor.name;
    // prototypeチェーンの復元（TypeScriptのextends Errorの問題対応）
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 録画セッション関連エラー
 */
export class InvalidStateTransitionError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_STATE_TRANSITION');
  }
}

export class InvalidOperationError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_OPERATION');
  }
}

/**
 * エンコーダー関連エラー
 * onRecordError で報告される3種類
 */
export class EncoderPrepareError extends DomainError {
  constructor(message: string) {
    super(message, 'PREPARE_FAILED');
  }
}

export class EncoderStartError extends DomainError {
  constructor(message: string) {
    super(message, 'START_FAILED');
  }
}

export class SegmentRotationError extends DomainError {
  constructor(message: string) {
    super(message, 'ROTATION_FAILED');
  }
}

/**
 * カメラ管理関連エラー
 */
export class CameraNotFoundError extends DomainError {
  constructor(message: string) {
    super(message, 'CAMERA_NOT_FOUND');
  }
}

export class RecorderBusyError extends DomainError {
  constructor(message: string) {
    super(message, 'RECORDER_BUSY');
  }
}

/**
 * 設定関連エラー
 */
export class ConfigurationError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION');
  }
}
