import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as argon2 from 'argon2';

/**
 * One-way password hashing with Argon2id.
 *
 * Every call to `hash` draws a fresh salt, so hashing the same secret twice
 * yields two different digests. The salt and cost parameters travel inside
 * the encoded digest, which is all `verify` needs.
 */
@Injectable()
export class PasswordHasherService {
  private readonly logger = new Logger(PasswordHasherService.name);
  private readonly memoryCost: number;
  private readonly timeCost: number;

  constructor(private readonly configService: ConfigService) {
    this.memoryCost = this.configService.get<number>(
      'passwordHash.memoryCost',
      65536,
    );
    this.timeCost = this.configService.get<number>('passwordHash.timeCost', 3);
  }

  async hash(secret: string): Promise<string> {
    return argon2.hash(secret, {
      type: argon2.argon2id,
      memoryCost: this.memoryCost,
      timeCost: this.timeCost,
    });
  }

  /**
   * Returns false for a wrong secret and for a digest argon2 cannot parse.
   */
  async verify(secret: string, digest: string): Promise<boolean> {
    try {
      return await argon2.verify(digest, secret);
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.warn(`Rejected unparseable password digest: ${errorMessage}`);
      return false;
    }
  }
}
