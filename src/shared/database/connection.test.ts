import { openDatabase } from './connection';
import { InfrastructureError } from '../../domain/errors/InfrastructureError';

jest.mock('../logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('openDatabase', () => {
  it('should create both tables in an in-memory database', () => {
    // Act
    const db = openDatabase(':memory:');

    // Assert
    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .pluck()
      .all();
    expect(tables).toEqual(['sent_notifications', 'users']);
    db.close();
  });

  it('should apply the schema idempotently', () => {
    // Arrange
    const db = openDatabase(':memory:');

    // Act & Assert
    expect(() =>
      db.exec(
        'CREATE TABLE IF NOT EXISTS users (id TEXT PRIMARY KEY); CREATE INDEX IF NOT EXISTS idx_sent_notifications_scope_date ON sent_notifications (scope_date);'
      )
    ).not.toThrow();
    db.close();
  });

  it('should wrap failures in InfrastructureError', () => {
    expect(() => openDatabase('/proc/definitely/not/writable/db.sqlite')).toThrow(
      InfrastructureError
    );
  });
});
