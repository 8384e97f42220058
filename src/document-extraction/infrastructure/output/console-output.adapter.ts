import { Injectable } from '@nestjs/common';
import { OutputPort } from '../../domain/ports/output.port';

@Injectable()
export class ConsoleOutputAdapter implements OutputPort {
  print(message: string): void {
    process.stdout.write(message.endsWith('\n') ? message : `${message}\n`);
  }
}
