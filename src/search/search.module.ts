import { Module } from '@nestjs/common';
import { RecordsModule } from '../records';
import { ExposureModule } from '../exposure';
import { RegistrySearchService } from './registry-search.service';
import { SearchResponseFormatter } from './search-response.formatter';

@Module({
    imports: [RecordsModule, ExposureModule],
    providers: [RegistrySearchService, SearchResponseFormatter],
    exports: [RegistrySearchService, SearchResponseFormatter, RecordsModule],
})
export class SearchModule { }
