import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { Server } from 'http';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/main';
import { Role } from '../src/common/enums/role.enum';
import { AUTH_CLOCK } from '../src/modules/auth/auth.constants';
import type { Clock } from '../src/modules/auth/interfaces/clock.interface';
import { UsersService } from '../src/modules/users/users.service';

class MutableClock implements Clock {
  private current = new Date();

  now(): Date {
    return this.current;
  }

  advance(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}

interface TokenPair {
  access_token: string;
  refresh_token: string;
  token_type: string;
}

describe('Marketplace E2E Tests', () => {
  let app: INestApplication;
  let server: Server;
  let clock: MutableClock;
  let adminToken: string;

  const login = async (email: string, password: string): Promise<TokenPair> => {
    const response = await request(server)
      .post('/api/v1/auth/login')
      .send({ email, password })
      .expect(200);
    return response.body;
  };

  const register = async (username: string): Promise<number> => {
    const response = await request(server)
      .post('/api/v1/users')
      .send({
        username,
        fullName: `${username} Tester`,
        email: `${username}@example.com`,
        password: 'secret123',
      })
      .expect(201);
    return response.body.id;
  };

  beforeAll(async () => {
    clock = new MutableClock();
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(AUTH_CLOCK)
      .useValue(clock)
      .compile();

    app = moduleFixture.createNestApplication({ logger: false });
    configureApp(app);
    await app.init();
    server = app.getHttpServer();

    await app.get(UsersService).createAccount(
      {
        username: 'admin',
        fullName: 'Site Admin',
        email: 'admin@example.com',
        password: 'admin-secret',
      },
      Role.ADMIN,
    );
    adminToken = (await login('admin@example.com', 'admin-secret'))
      .access_token;
  });

  afterAll(async () => {
    await app.close();
  });

  describe('Public endpoints', () => {
    it('should report health without a token', async () => {
      const response = await request(server).get('/api/v1/health').expect(200);

      expect(response.body.status).toBe('ok');
      expect(response.headers['x-correlation-id']).toEqual(expect.any(String));
    });

    it('should echo a caller-supplied correlation id', async () => {
      const response = await request(server)
        .get('/api/v1/health')
        .set('X-Correlation-Id', 'trace-123')
        .expect(200);

      expect(response.headers['x-correlation-id']).toBe('trace-123');
    });

    it('should answer simultaneous identical registrations with 201 and 400', async () => {
      const body = {
        username: 'twin',
        fullName: 'Tess Twin',
        email: 'twin@example.com',
        password: 'secret123',
      };

      const responses = await Promise.all([
        request(server).post('/api/v1/users').send(body),
        request(server).post('/api/v1/users').send(body),
      ]);

      expect(responses.map((response) => response.status).sort()).toEqual([
        201, 400,
      ]);
    });

    it('should reject a registration with unknown fields', async () => {
      await request(server)
        .post('/api/v1/users')
        .send({
          username: 'intruder',
          fullName: 'Ian Intruder',
          email: 'intruder@example.com',
          password: 'secret123',
          role: 'admin',
        })
        .expect(400);
    });
  });

  describe('Login, deactivation and token checks', () => {
    it('should stop accepting a token once the user is deactivated', async () => {
      const userId = await register('alice');
      const tokens = await login('alice@example.com', 'secret123');

      expect(tokens.token_type).toBe('bearer');

      const me = await request(server)
        .get('/api/v1/users/me')
        .set('Authorization', `Bearer ${tokens.access_token}`)
        .expect(200);
      expect(me.body).toEqual(
        expect.objectContaining({ id: userId, username: 'alice', role: 'user' }),
      );
      expect(me.body).not.toHaveProperty('passwordHash');

      await request(server)
        .patch(`/api/v1/admin/users/${userId}/deactivate`)
        .set('Authorization', `Bearer ${adminToken}`)
        .expect(200);

      const rejected = await request(server)
        .get('/api/v1/users/me')
        .set('Authorization', `Bearer ${tokens.access_token}`)
        .expect(401);
      expect(rejected.headers['www-authenticate']).toBe('Bearer');
      expect(rejected.body.message).toBe('Could not validate credentials');

      await request(server)
        .post('/api/v1/auth/login')
        .send({ email: 'alice@example.com', password: 'secret123' })
        .expect(401);
    });

    it('should answer 401 without a token', async () => {
      const response = await request(server).get('/api/v1/users/me').expect(401);

      expect(response.headers['www-authenticate']).toBe('Bearer');
    });

    it('should not accept a refresh token as an access token', async () => {
      await register('bruno');
      const tokens = await login('bruno@example.com', 'secret123');

      await request(server)
        .get('/api/v1/users/me')
        .set('Authorization', `Bearer ${tokens.refresh_token}`)
        .expect(401);
    });
  });

  describe('Expiry and refresh', () => {
    it('should issue a working access token after the old one expires', async () => {
      await register('carla');
      const tokens = await login('carla@example.com', 'secret123');

      clock.advance(31 * 60);

      await request(server)
        .get('/api/v1/users/me')
        .set('Authorization', `Bearer ${tokens.access_token}`)
        .expect(401);

      const refreshed = await request(server)
        .post('/api/v1/auth/refresh')
        .send({ refresh_token: tokens.refresh_token })
        .expect(200);
      expect(refreshed.body.token_type).toBe('bearer');
      expect(refreshed.body).not.toHaveProperty('refresh_token');

      await request(server)
        .get('/api/v1/users/me')
        .set('Authorization', `Bearer ${refreshed.body.access_token}`)
        .expect(200);

      // Keep the admin session usable for later tests
      adminToken = (await login('admin@example.com', 'admin-secret'))
        .access_token;
    });

    it('should refuse an access token on the refresh endpoint', async () => {
      await register('diego');
      const tokens = await login('diego@example.com', 'secret123');

      await request(server)
        .post('/api/v1/auth/refresh')
        .send({ refresh_token: tokens.access_token })
        .expect(401);
    });
  });

  describe('Role and ownership checks', () => {
    let sellerToken: string;
    let otherToken: string;
    let brandId: number;
    let carId: number;

    beforeAll(async () => {
      await register('seller');
      await register('other');
      sellerToken = (await login('seller@example.com', 'secret123'))
        .access_token;
      otherToken = (await login('other@example.com', 'secret123'))
        .access_token;

      const brand = await request(server)
        .post('/api/v1/admin/brands')
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ name: 'Volkswagen' })
        .expect(201);
      brandId = brand.body.id;

      const car = await request(server)
        .post('/api/v1/cars')
        .set('Authorization', `Bearer ${sellerToken}`)
        .send({
          carType: 'hatch',
          model: 'Gol',
          factoryYear: 2018,
          modelYear: 2019,
          color: 'white',
          fuelType: 'flex',
          transmission: 'manual',
          condition: 'used',
          mileage: 58000,
          plate: 'abc-1234',
          price: 38000,
          brandId,
        })
        .expect(201);
      carId = car.body.id;
      expect(car.body.plate).toBe('ABC1234');
    });

    it('should answer 403 with RBAC_ADMIN_REQUIRED for a regular user', async () => {
      const response = await request(server)
        .get('/api/v1/admin/users')
        .set('Authorization', `Bearer ${sellerToken}`)
        .expect(403);

      expect(response.body.errorCode).toBe('RBAC_ADMIN_REQUIRED');
      expect(response.body.message).toBe('Administrator privileges required');
      expect(response.body.details).toEqual({ currentRole: 'user', action: 'read' });
    });

    it("should answer 403 with RBAC_OWNERSHIP_REQUIRED on another user's car", async () => {
      const response = await request(server)
        .put(`/api/v1/cars/${carId}`)
        .set('Authorization', `Bearer ${otherToken}`)
        .send({ price: 1000 })
        .expect(403);

      expect(response.body.errorCode).toBe('RBAC_OWNERSHIP_REQUIRED');
    });

    it('should let the owner and an administrator edit the car', async () => {
      await request(server)
        .put(`/api/v1/cars/${carId}`)
        .set('Authorization', `Bearer ${sellerToken}`)
        .send({ price: 36000 })
        .expect(200);

      const response = await request(server)
        .put(`/api/v1/cars/${carId}`)
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ mileage: 59000 })
        .expect(200);

      expect(response.body).toEqual(
        expect.objectContaining({ price: 36000, mileage: 59000 }),
      );
    });

    it('should list cars publicly', async () => {
      const response = await request(server)
        .get('/api/v1/cars')
        .query({ brandId, maxPrice: 50000 })
        .expect(200);

      expect(response.body.data.map((car: { id: number }) => car.id)).toEqual([
        carId,
      ]);
    });

    it('should let an administrator take a car off the market', async () => {
      const response = await request(server)
        .patch(`/api/v1/admin/cars/${carId}/deactivate`)
        .set('Authorization', `Bearer ${adminToken}`)
        .expect(200);
      expect(response.body.status).toBe('unavailable');

      const listed = await request(server)
        .get('/api/v1/admin/cars')
        .query({ status: 'unavailable' })
        .set('Authorization', `Bearer ${adminToken}`)
        .expect(200);
      expect(listed.body.meta.total).toBe(1);
    });

    it('should take effect immediately when a user is promoted', async () => {
      const other = await request(server)
        .get('/api/v1/users/me')
        .set('Authorization', `Bearer ${otherToken}`)
        .expect(200);

      await request(server)
        .patch(`/api/v1/admin/users/${other.body.id}/role`)
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ role: 'admin' })
        .expect(200);

      await request(server)
        .get('/api/v1/admin/users')
        .set('Authorization', `Bearer ${otherToken}`)
        .expect(200);
    });
  });
});
