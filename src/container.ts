// src/container.ts
/** Production wiring: Mongo-backed stores, the Chapa gateway, redis for idempotency. */
import type { AppDeps } from "./app.js";
import { pingMongo } from "./config/db.js";
import { chapaSecretKey, env } from "./config/env.js";
import { pingRedis, redisKeyValueStore } from "./config/redis.js";
import { AuthService } from "./modules/auth/service.js";
import { BookingsService } from "./modules/bookings/service.js";
import { MongoBookingStore } from "./modules/bookings/store.js";
import { ListingsService } from "./modules/listings/service.js";
import { MongoListingStore } from "./modules/listings/store.js";
import { NotificationsService } from "./modules/notifications/service.js";
import { MongoNotificationStore } from "./modules/notifications/store.js";
import { ChapaGateway } from "./modules/payments/gateway.js";
import { PaymentCoordinator } from "./modules/payments/service.js";
import { MongoPaymentStore } from "./modules/payments/store.js";
import { ReviewsService } from "./modules/reviews/service.js";
import { MongoReviewStore } from "./modules/reviews/store.js";
import { UsersService } from "./modules/users/service.js";
import { MongoUserStore } from "./modules/users/store.js";

export function buildContainer(): AppDeps {
  const users = new MongoUserStore();
  const listings = new MongoListingStore();
  const reviews = new MongoReviewStore();
  const bookings = new MongoBookingStore();
  const payments = new MongoPaymentStore();
  const notifications = new NotificationsService(new MongoNotificationStore());

  return {
    services: {
      auth: new AuthService(users, env.BCRYPT_ROUNDS),
      users: new UsersService(users),
      listings: new ListingsService(listings),
      reviews: new ReviewsService(reviews, listings),
      bookings: new BookingsService(bookings, listings, payments),
      payments: new PaymentCoordinator({
        bookings,
        payments,
        gateway: new ChapaGateway({ baseUrl: env.CHAPA_BASE_URL }),
        notifier: notifications,
        config: {
          secretKey: chapaSecretKey(),
          currency: env.PAYMENT_CURRENCY,
          publicBaseUrl: env.PUBLIC_BASE_URL,
        },
      }),
      notifications,
    },
    idempotency: redisKeyValueStore(),
    healthChecks: { mongo: pingMongo, redis: pingRedis },
  };
}
