import { Inject, Injectable } from '@nestjs/common';
import { SupabaseClient } from '@supabase/supabase-js';
import { SUPABASE } from '../supabase/supabase.module';
import { SubmitIntakeDto } from './dto/submit-intake.dto';

export interface IntakeRow {
  id: number;
  full_name: string;
  phone_number: string;
}

/**
 * Plain CRUD over `intake_submissions`, unrelated to the conversation flow.
 */
@Injectable()
export class IntakeService {
  constructor(@Inject(SUPABASE) private readonly supabase: SupabaseClient) {}

  async submit(dto: SubmitIntakeDto): Promise<void> {
    const { error } = await this.supabase.from('intake_submissions').insert({
      full_name: dto.full_name,
      phone_number: dto.phone_number,
    });

    if (error) throw new Error(error.message);
  }

  async list(): Promise<IntakeRow[]> {
    const { data, error } = await this.supabase
      .from('intake_submissions')
      .select('id, full_name, phone_number')
      .order('id', { ascending: true });

    if (error) throw new Error(error.message);
    return (data ?? []).map((row: IntakeRow) => ({
      id: row.id,
      full_name: row.full_name,
      phone_number: row.phone_number,
    }));
  }
}
