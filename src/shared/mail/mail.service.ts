import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as nodemailer from 'nodemailer';
import { errorStack } from '@/shared/lib/util';

@Injectable()
export class MailService {
  private transporter: nodemailer.Transporter;
  private readonly logger = new Logger(MailService.name);

  constructor(private readonly configService: ConfigService) {
    const port = this.configService.get<number>('EMAIL_PORT', 465);
    this.transporter = nodemailer.createTransport({
      host: this.configService.get<string>('EMAIL_HOST', 'smtp.gmail.com'),
      port,
      secure: port === 465,
      auth: {
        user: this.configService.get<string>('EMAIL_USER'),
        pass: this.configService.get<string>('EMAIL_PASS'),
      },
    });
  }

  /**
   * Multipart mail with plain-text and HTML bodies. `to` may be a
   * comma-separated list.
   */
  async sendMail(to: string, subject: string, text: string, html: string) {
    try {
      const from = this.configService.get<string>('EMAIL_USER');
      await this.transporter.sendMail({
        from: `"YouTube Digest" <${from}>`,
        to,
        subject,
        text,
        html,
      });
      this.logger.log(`Email sent to ${to}`);
    } catch (error) {
      this.logger.error(`Failed to send email to ${to}`, errorStack(error));
      throw error;
    }
  }
}
