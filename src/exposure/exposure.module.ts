import { Module } from '@nestjs/common';
import { FieldExposureService } from './field-exposure.service';

@Module({
    providers: [FieldExposureService],
    exports: [FieldExposureService],
})
export class ExposureModule { }
