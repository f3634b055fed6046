import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  Logger,
  Post,
} from '@nestjs/common';
import { IntakeService } from './intake.service';
import { SubmitIntakeDto } from './dto/submit-intake.dto';

@Controller()
export class IntakeController {
  private readonly log = new Logger(IntakeController.name);

  constructor(private readonly intake: IntakeService) {}

  @Post('submit')
  @HttpCode(HttpStatus.OK)
  async submit(@Body() dto: SubmitIntakeDto) {
    try {
      await this.intake.submit(dto);
    } catch (err) {
      this.log.error(`[submit] ${String(err)}`);
      throw new InternalServerErrorException('Database error');
    }
    return { success: true, message: 'Data submitted successfully' };
  }

  @Get('data')
  async data() {
    try {
      return await this.intake.list();
    } catch (err) {
      this.log.error(`[data] ${String(err)}`);
      throw new InternalServerErrorException('Database error');
    }
  }
}
