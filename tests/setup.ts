/**
 * Path: tests/setup.ts
 * 테스트 공통 설정
 */

process.env.LOG_SILENT = "true"
delete process.env.LOG_DIR
