import { Global, Module } from '@nestjs/common';
import { DatabaseService } from 'src/db/database.service';
import {
  ConceptGroupRepository,
  ConceptRepository,
  IndividualRelationshipRepository,
  IndividualRepository,
  OntologyRepository,
  RelationshipRepository,
  UserRepository,
} from './repositories';

const repositories = [
  UserRepository,
  OntologyRepository,
  ConceptRepository,
  RelationshipRepository,
  IndividualRepository,
  IndividualRelationshipRepository,
  ConceptGroupRepository,
];

@Global()
@Module({
  providers: [DatabaseService, ...repositories],
  exports: [DatabaseService, ...repositories],
})
export class DatabaseModule {}
