/**
 * Health endpoints against a stubbed Sequelize connection.
 */
import { HttpStatus, Logger } from '@nestjs/common';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

const makeSequelize = () => ({
  authenticate: jest.fn(),
});

const makeResponse = () => {
  const res = { status: jest.fn() };
  res.status.mockReturnValue(res);
  return res;
};

describe('HealthController', () => {
  let sequelize: ReturnType<typeof makeSequelize>;
  let controller: HealthController;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    sequelize = makeSequelize();
    controller = new HealthController(new HealthService(sequelize as any));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reports ok while the database answers', async () => {
    sequelize.authenticate.mockResolvedValue(undefined);

    const report = await controller.health();

    expect(report.status).toBe('ok');
    expect(report.checks.database.status).toBe('up');
    expect(report.checks.database.error).toBeUndefined();
  });

  it('reports degraded with the failure when the database is down', async () => {
    sequelize.authenticate.mockRejectedValue(new Error('connect ECONNREFUSED'));

    const report = await controller.health();

    expect(report.status).toBe('degraded');
    expect(report.checks.database).toMatchObject({ status: 'down', error: 'connect ECONNREFUSED' });
  });

  it('answers ready without touching the status code when up', async () => {
    sequelize.authenticate.mockResolvedValue(undefined);
    const res = makeResponse();

    const report = await controller.ready(res as any);

    expect(report.status).toBe('ok');
    expect(res.status).not.toHaveBeenCalled();
  });

  it('answers 503 on ready when the database is down', async () => {
    sequelize.authenticate.mockRejectedValue(new Error('connect ECONNREFUSED'));
    const res = makeResponse();

    await controller.ready(res as any);

    expect(res.status).toHaveBeenCalledWith(HttpStatus.SERVICE_UNAVAILABLE);
  });

  it('gives up on a database that never answers', async () => {
    sequelize.authenticate.mockReturnValue(new Promise(() => undefined));
    const service = new HealthService(sequelize as any);

    const check = await service.checkDatabase(20);

    expect(check).toMatchObject({ status: 'down', error: 'timed out after 20ms' });
  });

  it('is always live', () => {
    expect(controller.live().status).toBe('ok');
    expect(sequelize.authenticate).not.toHaveBeenCalled();
  });
});
