import { ConfigService } from '@nestjs/config';
import { MailService } from './mail.service';

const mockSendMail = jest.fn();
const mockCreateTransport = jest.fn((_options: unknown) => ({
  sendMail: mockSendMail,
}));

jest.mock('nodemailer', () => ({
  createTransport: (options: unknown) => mockCreateTransport(options),
}));

describe('MailService', () => {
  const env = {
    EMAIL_HOST: 'smtp.test',
    EMAIL_PORT: 465,
    EMAIL_USER: 'digest@example.com',
    EMAIL_PASS: 'test-secret',
  };

  beforeEach(() => {
    mockSendMail.mockReset();
    mockCreateTransport.mockClear();
  });

  it('uses an implicit TLS transport on port 465', () => {
    new MailService(new ConfigService(env));

    expect(mockCreateTransport).toHaveBeenCalledWith({
      host: 'smtp.test',
      port: 465,
      secure: true,
      auth: { user: 'digest@example.com', pass: 'test-secret' },
    });
  });

  it('uses STARTTLS on other ports', () => {
    new MailService(new ConfigService({ ...env, EMAIL_PORT: 587 }));

    expect(mockCreateTransport).toHaveBeenCalledWith(
      expect.objectContaining({ port: 587, secure: false }),
    );
  });

  it('sends plain-text and HTML bodies together', async () => {
    mockSendMail.mockResolvedValue({ messageId: '<1@smtp.test>' });
    const service = new MailService(new ConfigService(env));

    await service.sendMail(
      'a@example.com, b@example.com',
      'Subject line',
      'plain body',
      '<p>html body</p>',
    );

    expect(mockSendMail).toHaveBeenCalledWith({
      from: '"YouTube Digest" <digest@example.com>',
      to: 'a@example.com, b@example.com',
      subject: 'Subject line',
      text: 'plain body',
      html: '<p>html body</p>',
    });
  });

  it('rethrows transport failures', async () => {
    mockSendMail.mockRejectedValue(new Error('auth failed'));
    const service = new MailService(new ConfigService(env));

    await expect(
      service.sendMail('a@example.com', 'Subject', 'text', '<p>html</p>'),
    ).rejects.toThrow('auth failed');
  });
});
