import Joi from 'joi';
import { ProductRecord } from '../types/integration';
import { lenientText, upstreamId, UpstreamModel } from './UpstreamModel';

interface RawProduct {
    id: number;
    title: string;
    price: number;
    category: string;
}

export class ProductModel extends UpstreamModel<RawProduct, ProductRecord> {
    protected readonly schema = Joi.object<RawProduct>({
        id: upstreamId,
        title: lenientText(),
        price: Joi.number().unsafe().min(0).default(0).failover(0),
        category: lenientText()
    });

    protected toRecord(raw: RawProduct): ProductRecord {
        return {
            id: raw.id,
            title: raw.title,
            price: raw.price,
            category: raw.category
        };
    }
}
