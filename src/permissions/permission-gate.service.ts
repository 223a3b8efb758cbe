import { Injectable, Logger } from '@nestjs/common';
import { GraphError } from '../common/errors/graph-error';
import {
  DomainUser,
  OntologyRepository,
  UserRepository,
} from '../database/repositories';
import {
  Authorization,
  OntologyAction,
  REQUIRED_LEVEL,
} from './permission.types';

const deny = (deniedReason: string): Authorization => ({
  allowed: false,
  deniedReason,
});

/**
 * Deny-by-default access decisions for one user and one ontology.
 * Owners may do everything; everyone else needs an active share or a public
 * ontology.
 */
@Injectable()
export class PermissionGateService {
  private readonly logger = new Logger(PermissionGateService.name);

  constructor(
    private readonly userRepository: UserRepository,
    private readonly ontologyRepository: OntologyRepository,
  ) {}

  async authorize(
    userId: string,
    ontologyId: number,
    action: OntologyAction,
  ): Promise<Authorization> {
    const [user, ontology] = await Promise.all([
      this.userRepository.findById(userId),
      this.ontologyRepository.findById(ontologyId),
    ]);
    if (!user) return deny(`Unknown user ${userId}`);
    if (!ontology) return deny(`Unknown ontology ${ontologyId}`);

    if (ontology.ownerId === userId) return { allowed: true };

    const share = await this.ontologyRepository.findActiveShare(ontologyId, userId);
    if (share && share.permissionLevel >= REQUIRED_LEVEL[action]) {
      return { allowed: true };
    }

    if (ontology.visibility === 'public') {
      if (action === OntologyAction.View) return { allowed: true };
      if (
        ontology.allowPublicEdit &&
        (action === OntologyAction.Add || action === OntologyAction.Edit)
      ) {
        return { allowed: true };
      }
    }

    return deny(`User ${userId} may not ${action} ontology ${ontologyId}`);
  }

  /** Throws PermissionDenied unless `authorize` allows the action. */
  async assertAllowed(
    userId: string,
    ontologyId: number,
    action: OntologyAction,
  ): Promise<void> {
    const result = await this.authorize(userId, ontologyId, action);
    if (!result.allowed) {
      this.logger.warn(`🚫 ${result.deniedReason}`);
      throw GraphError.permissionDenied(result.deniedReason);
    }
  }

  identify(userId: string): Promise<DomainUser | null> {
    return this.userRepository.findById(userId);
  }
}
