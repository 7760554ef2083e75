import type { Action } from '../core/action.js'
import { StatefulAction, restoreStateful } from '../core/stateful.js'
import type { StatefulActionJson } from '../core/stateful.js'
import { CreateDirectory } from './base/create-directory.js'
import { CreateFile } from './base/create-file.js'
import { CreateGroup } from './base/create-group.js'
import { CreateOrAppendFile } from './base/create-or-append-file.js'
import { CreateUser } from './base/create-user.js'
import { FetchAndUnpackNix } from './base/fetch-and-unpack-nix.js'
import { MoveUnpackedNix } from './base/move-unpacked-nix.js'
import { SetupDefaultProfile } from './base/setup-default-profile.js'
import { ConfigureNix } from './common/configure-nix.js'
import { ConfigureShellProfile } from './common/configure-shell-profile.js'
import { CreateNixTree } from './common/create-nix-tree.js'
import { CreateUsersAndGroup } from './common/create-users-and-group.js'
import { PlaceNixConfiguration } from './common/place-nix-configuration.js'
import { ProvisionNix } from './common/provision-nix.js'
import { ConfigureInitService } from './linux/configure-init-service.js'

export type AnyAction =
  | CreateDirectory
  | CreateFile
  | CreateOrAppendFile
  | CreateGroup
  | CreateUser
  | FetchAndUnpackNix
  | MoveUnpackedNix
  | SetupDefaultProfile
  | ConfigureInitService
  | CreateNixTree
  | CreateUsersAndGroup
  | ProvisionNix
  | PlaceNixConfiguration
  | ConfigureShellProfile
  | ConfigureNix

export type ActionTag = AnyAction['tag']

export class UnknownActionError extends Error {
  constructor(readonly actionName: string) {
    super(`Unknown action \`${actionName}\``)
    this.name = 'UnknownActionError'
  }
}

function decoderFor(tag: string): ((raw: unknown) => AnyAction) | undefined {
  switch (tag) {
    case 'create_directory': return CreateDirectory.fromJSON
    case 'create_file': return CreateFile.fromJSON
    case 'create_or_append_file': return CreateOrAppendFile.fromJSON
    case 'create_group': return CreateGroup.fromJSON
    case 'create_user': return CreateUser.fromJSON
    case 'fetch_and_unpack_nix': return FetchAndUnpackNix.fromJSON
    case 'move_unpacked_nix': return MoveUnpackedNix.fromJSON
    case 'setup_default_profile': return SetupDefaultProfile.fromJSON
    case 'configure_init_service': return ConfigureInitService.fromJSON
    case 'create_nix_tree': return CreateNixTree.fromJSON
    case 'create_users_and_group': return CreateUsersAndGroup.fromJSON
    case 'provision_nix': return ProvisionNix.fromJSON
    case 'place_nix_configuration': return PlaceNixConfiguration.fromJSON
    case 'configure_shell_profile': return ConfigureShellProfile.fromJSON
    case 'configure_nix': return ConfigureNix.fromJSON
    default: return undefined
  }
}

/**
 * Rebuild any action from its serialized form, selected by its `action_name`.
 */
export function decodeStatefulAction(json: StatefulActionJson): StatefulAction<Action> {
  const name = json.action.action_name
  const decode = decoderFor(name)
  if (!decode) throw new UnknownActionError(name)
  return restoreStateful(json, name, decode)
}
