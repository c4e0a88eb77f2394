import Joi from 'joi';
import { UserRecord } from '../types/integration';
import { lenientText, upstreamId, UpstreamModel } from './UpstreamModel';

interface RawUser {
    id: number;
    name: string;
    email: string;
    address: {
        city: string;
    };
}

const addressSchema = Joi.object({
    city: lenientText()
}).default({ city: '' }).failover({ city: '' });

export class UserModel extends UpstreamModel<RawUser, UserRecord> {
    protected readonly schema = Joi.object<RawUser>({
        id: upstreamId,
        name: lenientText(),
        email: lenientText(),
        address: addressSchema
    });

    protected toRecord(raw: RawUser): UserRecord {
        return {
            id: raw.id,
            name: raw.name,
            email: raw.email,
            city: raw.address.city
        };
    }
}
