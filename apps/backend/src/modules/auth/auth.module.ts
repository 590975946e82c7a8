import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { UsersModule } from '../users/users.module';
import { UsersRepository } from '../users/users.repository';
import { AuthController } from './auth.controller';
import { AUTH_CLOCK, AUTH_SETTINGS, USER_LOOKUP } from './auth.constants';
import { AuthService } from './auth.service';
import {
  AuthSettings,
  isSigningAlgorithm,
} from './interfaces/auth-settings.interface';
import { systemClock } from './interfaces/clock.interface';
import { AccessControlService } from './services/access-control.service';
import { TokenCodecService } from './services/token-codec.service';

export const authSettingsFactory = (
  configService: ConfigService,
): AuthSettings => {
  const algorithm = configService.get<string>('jwt.algorithm', 'HS256');
  if (!isSigningAlgorithm(algorithm)) {
    throw new Error(`Unsupported JWT algorithm: ${algorithm}`);
  }

  return {
    signingSecret: configService.getOrThrow<string>('jwt.secretKey'),
    signingAlgorithm: algorithm,
    accessTokenTtlSeconds:
      configService.get<number>('jwt.expirationMinutes', 30) * 60,
    refreshTokenTtlSeconds:
      configService.get<number>('jwt.refreshExpirationDays', 1) * 24 * 60 * 60,
  };
};

@Module({
  imports: [UsersModule, JwtModule.register({})],
  controllers: [AuthController],
  providers: [
    AuthService,
    TokenCodecService,
    AccessControlService,
    {
      provide: AUTH_SETTINGS,
      inject: [ConfigService],
      useFactory: authSettingsFactory,
    },
    { provide: AUTH_CLOCK, useValue: systemClock },
    { provide: USER_LOOKUP, useExisting: UsersRepository },
  ],
  exports: [AccessControlService, TokenCodecService],
})
export class AuthModule {}
