import mongoose from 'mongoose';
import bcrypt from 'bcryptjs';
import { env } from '../config/env.js';
import { connectDB } from '../config/database.js';
import { Accessory, Customer, Fabric, GarmentType, User } from '../models/index.js';
import { BCRYPT_ROUNDS } from '../modules/auth/auth.service.js';
import { Role } from '../utils/constants.js';
import { logger } from '../utils/logger.js';
import { loadSeedData, type SeedData } from './seed.data.js';

async function seedUsers(data: SeedData) {
  const admin = await User.findOne({ username: env.SEED_ADMIN_USERNAME });
  if (admin) {
    logger.info('Admin user already exists');
  } else {
    await User.create({
      username: env.SEED_ADMIN_USERNAME,
      email: env.SEED_ADMIN_EMAIL,
      firstName: 'System',
      lastName: 'Admin',
      phone: '09171234567',
      password: await bcrypt.hash(env.SEED_ADMIN_PASSWORD, BCRYPT_ROUNDS),
      roles: [Role.ADMIN],
    });
    logger.info(`Created admin user: ${env.SEED_ADMIN_USERNAME}`);
  }

  const tailor = await User.findOne({ username: data.tailor.username });
  if (tailor) {
    logger.info('Tailor user already exists');
  } else {
    await User.create({
      ...data.tailor,
      password: await bcrypt.hash(env.SEED_TAILOR_PASSWORD, BCRYPT_ROUNDS),
      roles: [Role.TAILOR],
    });
    logger.info(`Created tailor user: ${data.tailor.username}`);
  }
}

async function seedCatalog(data: SeedData) {
  for (const fabric of data.fabrics) {
    if (!(await Fabric.exists({ name: fabric.name }))) {
      await Fabric.create(fabric);
      logger.info(`  Created fabric: ${fabric.name}`);
    }
  }

  const accessoryIds = new Map<string, mongoose.Types.ObjectId>();
  for (const accessory of data.accessories) {
    const existing = await Accessory.findOne({ name: accessory.name });
    const doc = existing ?? (await Accessory.create(accessory));
    if (!existing) logger.info(`  Created accessory: ${accessory.name}`);
    accessoryIds.set(accessory.name, doc._id);
  }

  for (const { accessories, ...garment } of data.garmentTypes) {
    if (await GarmentType.exists({ name: garment.name })) continue;

    await GarmentType.create({
      ...garment,
      requiredAccessories: accessories.flatMap(([name, quantityRequired]) => {
        const accessoryId = accessoryIds.get(name);
        return accessoryId ? [{ accessoryId, quantityRequired }] : [];
      }),
    });
    logger.info(`  Created garment type: ${garment.name}`);
  }

  for (const customer of data.customers) {
    if (!(await Customer.exists({ contactNumber: customer.contactNumber }))) {
      await Customer.create(customer);
      logger.info(`  Created customer: ${customer.name}`);
    }
  }
}

async function seed(): Promise<void> {
  try {
    const data = loadSeedData();
    await connectDB();

    logger.info('Setting up initial data...');
    await seedUsers(data);
    await seedCatalog(data);
    logger.info('Setup complete');

    await mongoose.connection.close();
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, 'Seeding failed');
    await mongoose.connection.close();
    process.exit(1);
  }
}

void seed();
