import { Types } from 'mongoose';
import { GarmentType, Accessory, Order, User, AuditLog } from '../../models/index.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { AuditAction, Role } from '../../utils/constants.js';
import { requiredMeasurements } from './garments.measurements.js';
import type {
  CreateGarmentTypeInput,
  UpdateGarmentTypeInput,
  GarmentAccessoryInput,
} from './garments.validation.js';

async function assertAccessoriesExist(items: { accessoryId: string }[]) {
  if (items.length === 0) return;
  const ids = items.map((i) => i.accessoryId);
  const found = await Accessory.countDocuments({ _id: { $in: ids } });
  if (found !== ids.length) throw AppError.badRequest('One or more accessories do not exist');
}

async function assertTailor(tailorId: string | null | undefined) {
  if (!tailorId) return;
  const tailor = await User.exists({ _id: tailorId, roles: Role.TAILOR, isActive: true });
  if (!tailor) throw AppError.badRequest('Default tailor must be an active tailor');
}

export async function createGarmentType(input: CreateGarmentTypeInput, actorId: string, ip?: string, ua?: string) {
  await assertAccessoriesExist(input.requiredAccessories);
  await assertTailor(input.defaultTailorId);

  const garment = await GarmentType.create({
    ...input,
    defaultTailorId: input.defaultTailorId ?? undefined,
  });

  await AuditLog.create({
    action: AuditAction.GARMENT_TYPE_CREATED,
    actorId,
    targetType: 'garment_type',
    targetId: garment._id,
    details: { name: garment.name, basePrice: garment.basePrice },
    ipAddress: ip,
    userAgent: ua,
  });

  return garment;
}

export async function listGarmentTypes() {
  return GarmentType.find()
    .populate('defaultTailorId', 'firstName lastName username')
    .populate('requiredAccessories.accessoryId', 'name unit')
    .sort({ name: 1 });
}

export async function getGarmentType(garmentId: string) {
  const garment = await GarmentType.findById(garmentId)
    .populate('defaultTailorId', 'firstName lastName username')
    .populate('requiredAccessories.accessoryId', 'name unit stockQuantity');
  if (!garment) throw AppError.notFound('Garment type not found');

  const orderCount = await Order.countDocuments({ garmentTypeId: garment._id });

  return {
    garment,
    orderCount,
    requiredMeasurements: requiredMeasurements(garment.category),
  };
}

export async function updateGarmentType(
  garmentId: string,
  input: UpdateGarmentTypeInput,
  actorId: string,
  ip?: string,
  ua?: string,
) {
  const garment = await GarmentType.findById(garmentId);
  if (!garment) throw AppError.notFound('Garment type not found');

  if (input.requiredAccessories) await assertAccessoriesExist(input.requiredAccessories);
  await assertTailor(input.defaultTailorId);

  const { defaultTailorId, ...rest } = input;
  garment.set(rest);
  if (defaultTailorId !== undefined) {
    garment.set('defaultTailorId', defaultTailorId ?? undefined);
  }
  await garment.save();

  await AuditLog.create({
    action: AuditAction.GARMENT_TYPE_UPDATED,
    actorId,
    targetType: 'garment_type',
    targetId: garment._id,
    details: { changes: Object.keys(input) },
    ipAddress: ip,
    userAgent: ua,
  });

  return garment;
}

/** Add an accessory requirement, or update its quantity when already present. */
export async function upsertGarmentAccessory(garmentId: string, input: GarmentAccessoryInput, actorId: string) {
  const garment = await GarmentType.findById(garmentId);
  if (!garment) throw AppError.notFound('Garment type not found');
  await assertAccessoriesExist([input]);

  const existing = garment.requiredAccessories.find((a) => a.accessoryId.toString() === input.accessoryId);
  if (existing) {
    existing.quantityRequired = input.quantityRequired;
  } else {
    garment.requiredAccessories.push({
      accessoryId: new Types.ObjectId(input.accessoryId),
      quantityRequired: input.quantityRequired,
    });
  }
  await garment.save();

  await AuditLog.create({
    action: AuditAction.GARMENT_TYPE_UPDATED,
    actorId,
    targetType: 'garment_type',
    targetId: garment._id,
    details: { accessoryId: input.accessoryId, quantityRequired: input.quantityRequired },
  });

  return garment;
}

export async function removeGarmentAccessory(garmentId: string, accessoryId: string, actorId: string) {
  const garment = await GarmentType.findById(garmentId);
  if (!garment) throw AppError.notFound('Garment type not found');

  const before = garment.requiredAccessories.length;
  garment.requiredAccessories = garment.requiredAccessories.filter((a) => a.accessoryId.toString() !== accessoryId);
  if (garment.requiredAccessories.length === before) {
    throw AppError.notFound('Accessory is not required by this garment type');
  }
  await garment.save();

  await AuditLog.create({
    action: AuditAction.GARMENT_TYPE_UPDATED,
    actorId,
    targetType: 'garment_type',
    targetId: garment._id,
    details: { removedAccessoryId: accessoryId },
  });

  return garment;
}

export async function deleteGarmentType(garmentId: string, actorId: string, ip?: string, ua?: string) {
  const garment = await GarmentType.findById(garmentId);
  if (!garment) throw AppError.notFound('Garment type not found');

  const orderCount = await Order.countDocuments({ garmentTypeId: garment._id });
  if (orderCount > 0) {
    throw AppError.conflict('Cannot delete a garment type used by orders', ErrorCode.HAS_DEPENDENTS, { orderCount });
  }

  await garment.deleteOne();

  await AuditLog.create({
    action: AuditAction.GARMENT_TYPE_DELETED,
    actorId,
    targetType: 'garment_type',
    targetId: garment._id,
    details: { name: garment.name },
    ipAddress: ip,
    userAgent: ua,
  });

  return { message: 'Garment type deleted' };
}

/**
 * Materials and price for one unit, with current accessory stock, for order intake.
 */
export async function getGarmentRequirements(garmentId: string) {
  const garment = await GarmentType.findById(garmentId);
  if (!garment) throw AppError.notFound('Garment type not found');

  const accessories = await Accessory.find({
    _id: { $in: garment.requiredAccessories.map((a) => a.accessoryId) },
  });
  const byId = new Map(accessories.map((a) => [a._id.toString(), a]));

  return {
    garmentTypeId: garment._id,
    name: garment.name,
    category: garment.category,
    estimatedFabric: garment.estimatedFabricMeters,
    basePrice: garment.basePrice,
    defaultTailorId: garment.defaultTailorId ?? null,
    requiredMeasurements: requiredMeasurements(garment.category),
    accessories: garment.requiredAccessories.map((req) => {
      const accessory = byId.get(req.accessoryId.toString());
      return {
        accessoryId: req.accessoryId,
        name: accessory?.name ?? 'Unknown accessory',
        unit: accessory?.unit,
        quantityRequired: req.quantityRequired,
        available: accessory?.stockQuantity ?? 0,
      };
    }),
  };
}
