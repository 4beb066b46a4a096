/**
 * 파일 시스템 관련 상수
 */

/** 설정 디렉토리 이름 ($XDG_CONFIG_HOME 하위) */
export const CONFIG_DIR_NAME = 'jellyfzf';

/** 서버 목록 파일 이름 */
export const REGISTRY_FILENAME = 'servers.json';

/** 서버 목록 파일 권한 (소유자만 읽기/쓰기) */
export const REGISTRY_FILE_MODE = 0o600;

/** 서버 목록 레코드 버전 */
export const REGISTRY_VERSION = 1;
