/**
 * 애플리케이션 커스텀 에러 클래스
 *
 * 에러 타입 구분 및 일관된 에러 처리를 위한 에러 클래스
 */

/**
 * 기본 애플리케이션 에러
 */
export class AppError extends Error {
  readonly code: string;
  readonly isOperational: boolean;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code = 'APP_ERROR',
    options?: {
      cause?: Error;
      isOperational?: boolean;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'AppError';
    this.code = code;
    this.isOperational = options?.isOperational ?? true;
    this.timestamp = new Date();
    this.context = options?.context;

    // V8 스택 트레이스 유지
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * 등록된 서버 없음
 */
export class NotConfiguredError extends AppError {
  constructor(
    message = 'No Jellyfin server is configured',
    options?: {
      context?: Record<string, unknown>;
    }
  ) {
    super(message, 'NOT_CONFIGURED', {
      isOperational: true,
      context: options?.context,
    });
    this.name = 'NotConfiguredError';
  }
}

/**
 * 서버 목록 파일 손상 (읽기/파싱/스키마 실패)
 */
export class CorruptStateError extends AppError {
  readonly path?: string;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      path?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, 'CORRUPT_STATE', {
      cause: options?.cause,
      isOperational: false,
      context: options?.context,
    });
    this.name = 'CorruptStateError';
    this.path = options?.path;
  }
}

/**
 * 네트워크 또는 HTTP 실패
 */
export class ServerUnreachableError extends AppError {
  readonly statusCode?: number;
  readonly url?: string;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      statusCode?: number;
      url?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, 'SERVER_UNREACHABLE', {
      cause: options?.cause,
      isOperational: true,
      context: options?.context,
    });
    this.name = 'ServerUnreachableError';
    this.statusCode = options?.statusCode;
    this.url = options?.url;
  }
}

/**
 * 인증 실패 (401, 403)
 */
export class AuthFailedError extends AppError {
  readonly statusCode: 401 | 403;
  readonly url?: string;

  constructor(
    message: string,
    statusCode: 401 | 403 = 401,
    options?: {
      cause?: Error;
      url?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, 'AUTH_FAILED', {
      cause: options?.cause,
      isOperational: true,
      context: options?.context,
    });
    this.name = 'AuthFailedError';
    this.statusCode = statusCode;
    this.url = options?.url;
  }
}

/**
 * 서버 목록 저장 실패 (권한, 디스크 부족, 읽기 전용 디렉토리)
 * 메모리의 목록은 변경 전 상태로 남는다.
 */
export class RegistryWriteError extends AppError {
  readonly path?: string;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      path?: string;
    }
  ) {
    super(message, 'REGISTRY_WRITE_FAILED', {
      cause: options?.cause,
      isOperational: true,
      context: { path: options?.path },
    });
    this.name = 'RegistryWriteError';
    this.path = options?.path;
  }
}

/**
 * 응답 본문 검증 실패
 */
export class InvalidResponseError extends AppError {
  readonly source?: string;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      source?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, 'INVALID_RESPONSE', {
      cause: options?.cause,
      isOperational: true,
      context: options?.context,
    });
    this.name = 'InvalidResponseError';
    this.source = options?.source;
  }
}

/**
 * 재생 관련 에러 (플레이어 실행 실패, 비정상 종료)
 */
export class PlaybackFailedError extends AppError {
  readonly exitCode?: number | null;
  readonly signal?: string | null;
  readonly songId?: string;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      exitCode?: number | null;
      signal?: string | null;
      songId?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, 'PLAYBACK_FAILED', {
      cause: options?.cause,
      isOperational: true,
      context: options?.context,
    });
    this.name = 'PlaybackFailedError';
    this.exitCode = options?.exitCode;
    this.signal = options?.signal;
    this.songId = options?.songId;
  }
}

/**
 * 유효성 검사 에러
 */
export class ValidationError extends AppError {
  readonly field?: string;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      field?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, 'VALIDATION_ERROR', {
      cause: options?.cause,
      isOperational: true,
      context: options?.context,
    });
    this.name = 'ValidationError';
    this.field = options?.field;
  }
}

/**
 * 선택 메뉴(fzf 등) 실행 실패
 */
export class PickerError extends AppError {
  readonly command?: string;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      command?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, 'PICKER_ERROR', {
      cause: options?.cause,
      isOperational: false,
      context: options?.context,
    });
    this.name = 'PickerError';
    this.command = options?.command;
  }
}

/**
 * 설정 에러
 */
export class ConfigurationError extends AppError {
  readonly configKey?: string;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      configKey?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, 'CONFIGURATION_ERROR', {
      cause: options?.cause,
      isOperational: false, // 설정 에러는 보통 치명적
      context: options?.context,
    });
    this.name = 'ConfigurationError';
    this.configKey = options?.configKey;
  }
}

/**
 * 에러 타입 확인 유틸리티
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * 에러를 AppError로 래핑
 */
export function wrapError(
  error: unknown,
  message?: string,
  code?: string
): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const originalError = error instanceof Error ? error : new Error(String(error));

  return new AppError(message ?? originalError.message, code ?? 'UNKNOWN_ERROR', {
    cause: originalError,
    isOperational: false,
  });
}
