/**
 * Dental Clinic API - Path Id Pipe
 *
 * Parses `:id` like `ParseIntPipe`. Ids outside the key range cannot match a
 * row and answer 404 without a query.
 */

import { ArgumentMetadata, Injectable, NotFoundException, ParseIntPipe, PipeTransform } from '@nestjs/common';
import { isRecordId } from '../validation/record-id';

@Injectable()
export class ParseIdPipe implements PipeTransform<string, Promise<number>> {
  private readonly parseInt = new ParseIntPipe();

  async transform(value: string, metadata: ArgumentMetadata): Promise<number> {
    const id = await this.parseInt.transform(value, metadata);
    if (!isRecordId(id)) {
      throw new NotFoundException({ code: 'not_found', message: 'Not found.' });
    }
    return id;
  }
}
