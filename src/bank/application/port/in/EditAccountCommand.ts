import {z} from 'zod';
import {accountNumberSchema, requiredString} from './CommandSchemas';
import {validateCommand} from './CommandValidation';

const EditAccountCommandSchema = z.object({
    accountNumber: accountNumberSchema(),
    oldPin: requiredString('PIN cannot be null or empty'),
    newName: requiredString('New name cannot be null or empty'),
});

/**
 * 名義変更コマンド
 */
export class EditAccountCommand {
    constructor(
        public readonly accountNumber: string,
        public readonly oldPin: string,
        public readonly newName: string
    ) {
        validateCommand(EditAccountCommandSchema, {accountNumber, oldPin, newName});
    }
}
